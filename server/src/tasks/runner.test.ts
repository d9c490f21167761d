import { describe, expect, it, vi } from 'vitest'
import { getLogger } from '../lib/logger'
import { TaskError } from './errors'
import { TaskRegistry } from './registry'
import { runTask } from './runner'

const log = getLogger('worker')
const ctx = { taskId: 't1', progress: vi.fn(async () => {}) }

describe('TaskRegistry', () => {
  it('refuses to register a name twice', () => {
    const registry = new TaskRegistry().register('a', async () => 1)
    expect(() => registry.register('a', async () => 2)).toThrow('Task already registered: a')
    expect(registry.names()).toEqual(['a'])
  })
})

describe('runTask', () => {
  it('wraps the handler value', async () => {
    const registry = new TaskRegistry().register('double', async (payload) => (typeof payload === 'number' ? payload * 2 : 0))
    expect(await runTask(registry, 'double', 21, ctx, log)).toEqual({ ok: true, value: 42 })
  })

  it('turns thrown errors into error outcomes', async () => {
    const registry = new TaskRegistry()
      .register('expected', async () => {
        throw new TaskError('QuotaExceeded', 'No quota left.')
      })
      .register('crash', async () => {
        throw new RangeError('index out of range')
      })
      .register('weird', async () => {
        throw 'plain string'
      })

    expect(await runTask(registry, 'expected', null, ctx, log)).toEqual({ ok: false, error: { type: 'QuotaExceeded', message: 'No quota left.' } })
    expect(await runTask(registry, 'crash', null, ctx, log)).toEqual({ ok: false, error: { type: 'RangeError', message: 'index out of range' } })
    expect(await runTask(registry, 'weird', null, ctx, log)).toEqual({ ok: false, error: { type: 'Error', message: 'plain string' } })
  })

  it('reports unknown tasks', async () => {
    expect(await runTask(new TaskRegistry(), 'missing', null, ctx, log)).toEqual({
      ok: false,
      error: { type: 'UnknownTask', message: 'Unknown task: missing' },
    })
  })
})
