/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_RELEASE?: string
  readonly VITE_SENTRY_DSN?: string
  readonly VITE_SENTRY_ENV?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}

interface Window {
  /** Build release of the form script, for matching browser reports to API logs. */
  __FORMTASK_RELEASE__?: string
}
