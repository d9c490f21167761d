import { v4 as uuidv4 } from 'uuid'
import { withTaskContext } from '../lib/logger'
import type { TaskRegistry } from './registry'
import { runTask } from './runner'
import type { TaskBackend, TaskMeta, TaskSnapshot } from './types'

const DEFAULT_RESULT_TTL_MS = 60 * 60 * 1000

interface Entry {
  snapshot: TaskSnapshot
  done: Promise<void>
}

export interface InlineTaskBackendOptions {
  /** How long finished results stay queryable. */
  resultTtlMs?: number
  idFactory?: () => string
}

/**
 * Runs tasks inside the API process (no Redis). Used when no queue is configured
 * and by tests. Tasks start on the next tick, so enqueue always returns a PENDING task.
 */
export class InlineTaskBackend implements TaskBackend {
  readonly kind = 'inline' as const
  private readonly tasks = new Map<string, Entry>()
  private readonly expiry = new Set<NodeJS.Timeout>()
  private readonly resultTtlMs: number
  private readonly idFactory: () => string

  constructor(
    private readonly registry: TaskRegistry,
    options: InlineTaskBackendOptions = {}
  ) {
    this.resultTtlMs = options.resultTtlMs ?? DEFAULT_RESULT_TTL_MS
    this.idFactory = options.idFactory ?? uuidv4
  }

  async enqueue(name: string, payload: unknown, meta: TaskMeta = {}): Promise<{ id: string }> {
    if (!this.registry.has(name)) {
      throw new Error(`Unknown task: ${name}`)
    }
    const id = this.idFactory()
    const entry: Entry = {
      snapshot: { id, name, state: 'PENDING', ready: false },
      done: Promise.resolve(),
    }
    this.tasks.set(id, entry)
    entry.done = this.execute(entry, payload, meta)
    return { id }
  }

  async get(id: string): Promise<TaskSnapshot | null> {
    const entry = this.tasks.get(id)
    return entry ? { ...entry.snapshot } : null
  }

  async wait(id: string, timeoutMs: number): Promise<TaskSnapshot | null> {
    const entry = this.tasks.get(id)
    if (!entry) return null
    if (!entry.snapshot.ready && timeoutMs > 0) {
      let timer: NodeJS.Timeout | undefined
      const timeout = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs)
      })
      await Promise.race([entry.done, timeout])
      clearTimeout(timer)
    }
    return this.get(id)
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    for (const timer of this.expiry) clearTimeout(timer)
    this.expiry.clear()
    await Promise.all(Array.from(this.tasks.values(), (e) => e.done))
  }

  private async execute(entry: Entry, payload: unknown, meta: TaskMeta): Promise<void> {
    await new Promise<void>((resolve) => setImmediate(resolve))
    const { id, name } = entry.snapshot
    const log = withTaskContext(id, name, meta.requestId)
    entry.snapshot = { ...entry.snapshot, state: 'STARTED' }

    const outcome = await runTask(
      this.registry,
      name,
      payload,
      {
        taskId: id,
        progress: async (percentage) => {
          if (entry.snapshot.ready) return
          entry.snapshot = { ...entry.snapshot, state: 'PROGRESS', percentage }
        },
      },
      log,
      meta.requestId
    )

    entry.snapshot = outcome.ok
      ? { id, name, state: 'SUCCESS', ready: true, value: outcome.value }
      : { id, name, state: 'FAILURE', ready: true, error: outcome.error }

    const timer = setTimeout(() => {
      this.tasks.delete(id)
      this.expiry.delete(timer)
    }, this.resultTtlMs)
    timer.unref()
    this.expiry.add(timer)
  }
}
