import { env, resolveTaskBackend } from './env'
import { createApp } from './app'
import { getLogger } from './lib/logger'
import { initSentry } from './lib/sentry'
import { BullTaskBackend } from './tasks/bullBackend'
import { COUNTDOWN_TASK, createCountdownTask } from './tasks/countdown'
import { InlineTaskBackend } from './tasks/inlineBackend'
import { TaskRegistry } from './tasks/registry'
import type { TaskBackend } from './tasks/types'
import { startTaskWorker } from './workers/taskWorker'

initSentry()

const log = getLogger('api')

const registry = new TaskRegistry().register(COUNTDOWN_TASK, createCountdownTask())

function createBackend(): TaskBackend {
  const kind = resolveTaskBackend(env)
  if (kind === 'bull') {
    if (!env.REDIS_URL) {
      throw new Error('TASK_BACKEND=bull requires REDIS_URL')
    }
    const backend = new BullTaskBackend(env.REDIS_URL)
    // The worker runs in a separate container when DISABLE_WORKER=true.
    if (!env.DISABLE_WORKER) {
      startTaskWorker(backend, registry, env.WORKER_CONCURRENCY)
    }
    return backend
  }
  log.warn({ msg: 'No task queue configured; running tasks inside the API process' })
  return new InlineTaskBackend(registry)
}

const backend = createBackend()
const app = createApp({ backend })

const server = app.listen(env.PORT, () => {
  log.info({ msg: 'Server listening', port: env.PORT, backend: backend.kind })
})

server.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EADDRINUSE') {
    log.fatal({ msg: `Port ${env.PORT} is already in use; change PORT in your .env file` })
  } else {
    log.fatal({ msg: 'Server error', err: error })
  }
  process.exit(1)
})

// Handle process termination gracefully
function shutdown(signal: string) {
  log.info({ msg: `${signal} received, shutting down gracefully` })
  server.close(() => {
    backend
      .close()
      .then(() => {
        log.info({ msg: 'Server closed' })
        process.exit(0)
      })
      .catch((err: unknown) => {
        log.error({ msg: 'Task queue did not close cleanly', err })
        process.exit(1)
      })
  })
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
