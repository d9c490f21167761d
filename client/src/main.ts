import { initAsyncForms } from './lib/asyncForms'
import { initSentry } from './lib/sentry'

export { initAsyncForms } from './lib/asyncForms'
export { AsyncTaskController } from './lib/asyncTask'
export { BACKOFFICE_POLICY, WIDGET_POLICY } from './lib/taskPolicy'
export type { AsyncTaskPolicy } from './lib/taskPolicy'
export type { TaskState } from './lib/taskPolling'

initSentry()

// Expose release for debugging (correlation with API/worker logs)
const release = import.meta.env.VITE_RELEASE ?? 'dev'
window.__FORMTASK_RELEASE__ = release

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', () => initAsyncForms(document))
} else {
  initAsyncForms(document)
}
