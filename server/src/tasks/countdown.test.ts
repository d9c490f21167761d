import { describe, expect, it, vi } from 'vitest'
import { createCountdownTask } from './countdown'
import { ValidationError } from './errors'

describe('countdown task', () => {
  it('counts down with progress and returns the label', async () => {
    const sleep = vi.fn(async (_ms: number) => {})
    const progress = vi.fn(async (_percentage: number) => {})
    const task = createCountdownTask(sleep)

    const result = await task({ label: '  Launch ', seconds: '3' }, { taskId: 't1', progress })

    expect(result).toMatchObject({ label: 'Launch', seconds: 3 })
    expect(sleep).toHaveBeenCalledTimes(3)
    expect(sleep).toHaveBeenCalledWith(1000)
    expect(progress.mock.calls.map(([p]) => p)).toEqual([33, 67, 100])
  })

  it('finishes at once for zero seconds', async () => {
    const sleep = vi.fn(async (_ms: number) => {})
    const result = await createCountdownTask(sleep)({ seconds: 0 }, { taskId: 't1', progress: async () => {} })
    expect(result).toMatchObject({ label: '', seconds: 0 })
    expect(sleep).not.toHaveBeenCalled()
  })

  it('rejects long countdowns with a ValidationError', async () => {
    const task = createCountdownTask(async () => {})
    const run = task({ seconds: 31 }, { taskId: 't1', progress: async () => {} })
    await expect(run).rejects.toBeInstanceOf(ValidationError)
    await expect(run).rejects.toThrow('Countdowns longer than 30 seconds are not allowed.')
  })

  it('rejects payloads it cannot read', async () => {
    const task = createCountdownTask(async () => {})
    await expect(task({ seconds: 'soon' }, { taskId: 't1', progress: async () => {} })).rejects.toThrow('The countdown settings are invalid.')
  })
})
