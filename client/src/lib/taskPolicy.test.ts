import { describe, expect, it } from 'vitest'
import { BACKOFFICE_POLICY, WIDGET_POLICY, getPolicyPreset } from './taskPolicy'

describe('getPolicyPreset', () => {
  it('finds presets by name', () => {
    expect(getPolicyPreset('widget')).toBe(WIDGET_POLICY)
    expect(getPolicyPreset('backoffice')).toBe(BACKOFFICE_POLICY)
  })

  it('falls back to the back office preset', () => {
    expect(getPolicyPreset(undefined)).toBe(BACKOFFICE_POLICY)
    expect(getPolicyPreset('')).toBe(BACKOFFICE_POLICY)
    expect(getPolicyPreset('toString')).toBe(BACKOFFICE_POLICY)
  })
})
