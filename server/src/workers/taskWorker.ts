import type Queue from 'bull'
import { getLogger, withTaskContext } from '../lib/logger'
import type { BullTaskBackend, TaskJobData } from '../tasks/bullBackend'
import type { TaskRegistry } from '../tasks/registry'
import { runTask } from '../tasks/runner'
import type { TaskOutcome } from '../tasks/types'

const log = getLogger('worker')

/** Run one queued job through its registered handler. The outcome becomes the job's return value. */
export async function processTaskJob(registry: TaskRegistry, job: Queue.Job<TaskJobData>): Promise<TaskOutcome> {
  const taskId = String(job.id)
  const { payload, requestId } = job.data
  return runTask(
    registry,
    job.name,
    payload,
    {
      taskId,
      progress: async (percentage) => {
        await job.progress(Math.round(percentage))
      },
    },
    withTaskContext(taskId, job.name, requestId),
    requestId
  )
}

/**
 * Consume every named job on the task queue. Handlers report expected failures
 * through the outcome, so a Bull "failed" job means the handler process itself broke.
 */
export function startTaskWorker(backend: BullTaskBackend, registry: TaskRegistry, concurrency: number): void {
  backend.queue.process('*', concurrency, (job) => processTaskJob(registry, job)).catch((err: unknown) => {
    log.error({ msg: 'Task worker stopped', err })
  })

  backend.queue.on('failed', (job, err) => {
    log.error({ msg: 'Task job failed', taskId: String(job.id), task: job.name, err })
  })

  backend.queue.on('error', (err) => {
    log.error({ msg: 'Task queue error', err })
  })

  log.info({ msg: 'Task worker started', tasks: registry.names(), concurrency })
}
