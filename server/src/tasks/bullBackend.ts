import Queue from 'bull'
import { z } from 'zod'
import { getLogger } from '../lib/logger'
import { createRedisClientFactory } from '../utils/redis'
import { QueueConnectionError } from './errors'
import { isReadyState, type TaskBackend, type TaskMeta, type TaskSnapshot } from './types'

export const TASK_QUEUE_NAME = 'formtask-tasks'

/** How often wait() re-reads the job while the client holds the request open. */
const WAIT_POLL_INTERVAL_MS = 50

export interface TaskJobData {
  payload: unknown
  requestId?: string
}

/** The parts of a Bull job that decide its task state. */
export interface JobView {
  id: string | number
  name: string
  state: string
  progress: unknown
  returnvalue: unknown
  failedReason?: string
}

const outcomeSchema = z.union([
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({ ok: z.literal(false), error: z.object({ type: z.string(), message: z.string() }) }),
])

/**
 * Map a Bull job to a task snapshot.
 *   waiting | delayed | paused | stuck → PENDING
 *   active → STARTED, or PROGRESS once the handler reported a percentage
 *   completed → SUCCESS / FAILURE from the stored outcome envelope
 *   failed → FAILURE (the worker process itself crashed or timed out)
 */
export function snapshotFromJob(job: JobView): TaskSnapshot {
  const base = { id: String(job.id), name: job.name }
  switch (job.state) {
    case 'active': {
      const percentage = typeof job.progress === 'number' && job.progress > 0 ? job.progress : undefined
      return percentage === undefined
        ? { ...base, state: 'STARTED', ready: false }
        : { ...base, state: 'PROGRESS', ready: false, percentage }
    }
    case 'completed': {
      const parsed = outcomeSchema.safeParse(job.returnvalue)
      if (!parsed.success) {
        return { ...base, state: 'FAILURE', ready: true, error: { type: 'Error', message: 'Task returned an unreadable result' } }
      }
      return parsed.data.ok
        ? { ...base, state: 'SUCCESS', ready: true, value: parsed.data.value }
        : { ...base, state: 'FAILURE', ready: true, error: parsed.data.error }
    }
    case 'failed':
      return { ...base, state: 'FAILURE', ready: true, error: { type: 'Error', message: job.failedReason || 'Task failed' } }
    default:
      return { ...base, state: 'PENDING', ready: false }
  }
}

async function viewJob(job: Queue.Job<TaskJobData>): Promise<JobView> {
  return {
    id: job.id,
    name: job.name,
    state: await job.getState(),
    progress: job.progress(),
    returnvalue: job.returnvalue,
    failedReason: job.failedReason,
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Tasks on a Bull queue in Redis; the worker (workers/taskWorker.ts) runs them. */
export class BullTaskBackend implements TaskBackend {
  readonly kind = 'bull' as const
  readonly queue: Queue.Queue<TaskJobData>
  private readonly log = getLogger('api')

  constructor(redisUrl: string, queue?: Queue.Queue<TaskJobData>) {
    this.queue =
      queue ??
      new Queue<TaskJobData>(TASK_QUEUE_NAME, {
        createClient: createRedisClientFactory(redisUrl),
        defaultJobOptions: {
          // Finished jobs must outlive the longest poll; older ones are trimmed.
          removeOnComplete: 1000,
          removeOnFail: 1000,
        },
      })
  }

  async enqueue(name: string, payload: unknown, meta: TaskMeta = {}): Promise<{ id: string }> {
    const data: TaskJobData = { payload, requestId: meta.requestId }
    let job: Queue.Job<TaskJobData>
    try {
      job = await this.queue.add(name, data)
    } catch (err) {
      // Redis probably just restarted; the job was very likely not stored. Try once more.
      this.log.warn({ msg: 'Enqueue failed, retrying once', task: name, err })
      try {
        job = await this.queue.add(name, data)
      } catch (retryErr) {
        throw new QueueConnectionError('Could not enqueue task', { cause: retryErr })
      }
    }
    return { id: String(job.id) }
  }

  async get(id: string): Promise<TaskSnapshot | null> {
    const job = await this.queue.getJob(id)
    if (!job) return null
    return snapshotFromJob(await viewJob(job))
  }

  async wait(id: string, timeoutMs: number): Promise<TaskSnapshot | null> {
    const deadline = Date.now() + timeoutMs
    let snapshot = await this.get(id)
    while (snapshot && !isReadyState(snapshot.state) && Date.now() < deadline) {
      await sleep(Math.min(WAIT_POLL_INTERVAL_MS, Math.max(0, deadline - Date.now())))
      snapshot = await this.get(id)
    }
    return snapshot
  }

  async ping(): Promise<void> {
    await this.queue.client.ping()
  }

  async close(): Promise<void> {
    await this.queue.close()
  }
}
