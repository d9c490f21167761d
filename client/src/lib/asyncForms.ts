import { AsyncTaskController, type AsyncTaskOptions } from './asyncTask'
import { DomPresentation } from './presentation'
import { getPolicyPreset } from './taskPolicy'
import { findResumableCheckUrl } from './taskSession'

export const FORM_SELECTOR = 'form[data-asynctask]'
export const RESUME_SELECTOR = '[data-asynctask-resume]'

export interface AsyncFormsHandle {
  controllers: AsyncTaskController[]
  /** Controller polling a task the page was reloaded on, if any. */
  resumed: AsyncTaskController | null
  detach(): void
}

/**
 * Attach a controller to every `form[data-asynctask]` below root, and resume polling
 * when the page itself is a waiting page (`[data-asynctask-resume]` + ?async_id= in the URL).
 *
 * Per form: `data-asynctask-message` is the waiting text, `data-asynctask-policy`
 * picks a timing preset (`backoffice`, `widget`).
 */
export function initAsyncForms(
  root: Document | Element = document,
  options: Omit<AsyncTaskOptions, 'message' | 'policy'> = {}
): AsyncFormsHandle {
  const doc = root instanceof Document ? root : root.ownerDocument
  const presentation = options.presentation ?? new DomPresentation(doc)

  const controllers = Array.from(root.querySelectorAll<HTMLFormElement>(FORM_SELECTOR)).map((form) => {
    const controller = new AsyncTaskController(form, {
      ...options,
      presentation,
      message: form.dataset.asynctaskMessage || undefined,
      policy: getPolicyPreset(form.dataset.asynctaskPolicy),
    })
    controller.attach()
    return controller
  })

  let resumed: AsyncTaskController | null = null
  const marker = root.querySelector<HTMLElement>(RESUME_SELECTOR)
  const location = options.location ?? window.location
  const checkUrl = marker ? findResumableCheckUrl(location) : null
  if (marker && checkUrl) {
    // The waiting page has no form of its own; a detached one carries the loop.
    const form = doc.createElement('form')
    resumed = new AsyncTaskController(form, {
      ...options,
      presentation,
      message: marker.dataset.asynctaskMessage || undefined,
      policy: getPolicyPreset(marker.dataset.asynctaskPolicy),
    })
    resumed.resume(checkUrl)
  }

  return {
    controllers,
    resumed,
    detach() {
      for (const c of controllers) c.detach()
      resumed?.cancel()
    },
  }
}
