/**
 * Sentry for API and worker: errors only. Enabled only when SENTRY_DSN is set.
 * Uses @sentry/node v8: setupExpressErrorHandler(app) after routes; no request handler (auto-instrumentation).
 */
import * as Sentry from '@sentry/node'
import type { Express, Request, Response, NextFunction } from 'express'
import { env } from '../env'
import { getRequestId } from '../middleware/requestId'

const DSN = env.SENTRY_DSN?.trim()

export function initSentry(): void {
  if (!DSN) return
  Sentry.init({
    dsn: DSN,
    environment: env.NODE_ENV,
    release: env.RELEASE,
    integrations: [Sentry.expressIntegration()],
  })
}

/** Call after all routes; captures errors and sends response. No-op if SENTRY_DSN not set. */
export function setupSentryErrorHandler(app: Express): void {
  if (!DSN) return
  Sentry.setupExpressErrorHandler(app)
}

/** Set requestId on Sentry scope for correlation. Run after requestIdMiddleware. */
export function sentryRequestIdScope(req: Request, _res: Response, next: NextFunction): void {
  const id = getRequestId(req)
  if (DSN && id) Sentry.getCurrentScope().setTag('request_id', id)
  next()
}

/** Capture an unexpected task exception with taskId/requestId/task tags. */
export function captureTaskError(taskId: string, requestId: string | undefined, taskName: string, err: unknown): void {
  if (!DSN) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'worker')
    scope.setTag('task_id', taskId)
    scope.setTag('task', taskName)
    if (requestId) scope.setTag('request_id', requestId)
    Sentry.captureException(err)
  })
}
