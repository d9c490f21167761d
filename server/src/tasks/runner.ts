import type pino from 'pino'
import { captureTaskError } from '../lib/sentry'
import { TaskError, toTaskErrorInfo } from './errors'
import type { TaskRegistry } from './registry'
import type { TaskContext, TaskOutcome } from './types'

/**
 * Run one task handler and fold the result into an outcome. Never throws:
 * expected failures (TaskError) are logged at info, anything else at error and sent to Sentry.
 */
export async function runTask(
  registry: TaskRegistry,
  name: string,
  payload: unknown,
  ctx: TaskContext,
  log: pino.Logger,
  requestId?: string
): Promise<TaskOutcome> {
  const handler = registry.get(name)
  if (!handler) {
    log.error({ msg: 'Unknown task' })
    return { ok: false, error: { type: 'UnknownTask', message: `Unknown task: ${name}` } }
  }

  const startedAt = Date.now()
  log.info({ msg: 'Task started' })
  try {
    const value = await handler(payload, ctx)
    log.info({ msg: 'Task succeeded', durationMs: Date.now() - startedAt })
    return { ok: true, value }
  } catch (err) {
    const error = toTaskErrorInfo(err)
    if (err instanceof TaskError) {
      log.info({ msg: 'Task failed', errorType: error.type, durationMs: Date.now() - startedAt })
    } else {
      log.error({ msg: 'Task crashed', err, durationMs: Date.now() - startedAt })
      captureTaskError(ctx.taskId, requestId, name, err)
    }
    return { ok: false, error }
  }
}
