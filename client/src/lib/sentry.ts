/**
 * Sentry for the form script. Enabled only when VITE_SENTRY_DSN is set at build time.
 * Env: VITE_SENTRY_DSN, VITE_SENTRY_ENV (default development), VITE_RELEASE.
 */
import * as Sentry from '@sentry/browser'

const DSN = import.meta.env.VITE_SENTRY_DSN
const ENV = import.meta.env.VITE_SENTRY_ENV || (import.meta.env.MODE === 'production' ? 'production' : 'development')
const RELEASE = import.meta.env.VITE_RELEASE

let enabled = false

export function initSentry(): void {
  if (!DSN || !DSN.trim()) return
  Sentry.init({
    dsn: DSN,
    environment: ENV,
    release: RELEASE || undefined,
  })
  enabled = true
}

/** Errors that escape the async task loop. Sentry when configured, console otherwise and in development. */
export function reportClientError(error: unknown): void {
  if (import.meta.env.DEV || !enabled) {
    // eslint-disable-next-line no-console
    console.error('[formtask]', error)
  }
  if (enabled) Sentry.captureException(error)
}
