/**
 * Structured JSON logger for API and worker. Single format: level, timestamp, service, env, release, requestId/taskId.
 * Redacts known sensitive keys. Use LOG_LEVEL=debug only when needed (off by default).
 */
import pino from 'pino'
import { env } from '../env'

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'password',
  'token',
  'csrfmiddlewaretoken',
  'authorization',
  'cookie',
  'Cookie',
  'email',
  '*.email',
  '*.password',
  'req.headers.authorization',
  'req.headers.cookie',
  'res.headers["set-cookie"]',
  'REDIS_URL',
  'SENTRY_DSN',
]

export type ServiceName = 'api' | 'worker'

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
    base: { service, env: env.NODE_ENV, release: env.RELEASE },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Create a child logger with requestId (for API request context). */
export function withRequestId(requestId: string | undefined): pino.Logger {
  return getLogger('api').child({ requestId: requestId || undefined })
}

/** Create a child logger with taskId, task name and requestId (for worker task context). */
export function withTaskContext(taskId: string, taskName: string, requestId?: string): pino.Logger {
  return getLogger('worker').child({ taskId, task: taskName, requestId: requestId || undefined })
}
