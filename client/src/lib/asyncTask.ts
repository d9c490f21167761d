import {
  HttpError,
  MalformedResponseError,
  getTaskStatus,
  submitForm,
  type FetchLike,
  type SubmitResponse,
  type TaskStatus,
} from './api'
import { resolveUrl } from './apiBase'
import { buildLoginUrl, getFailurePresentation } from './failureMessage'
import { MESSAGES } from './messages'
import { DomPresentation, type TaskPresentation } from './presentation'
import { timerScheduler, type Scheduler } from './scheduler'
import { reportClientError } from './sentry'
import { BACKOFFICE_POLICY, type AsyncTaskPolicy } from './taskPolicy'
import { IDLE, isBusy, transition, type FailureReason, type TaskEvent, type TaskHandle, type TaskState } from './taskPolling'
import { rememberCheckUrl, taskIdFromCheckUrl, type HistoryLike } from './taskSession'

type LocationLike = Pick<Location, 'href' | 'origin' | 'pathname' | 'search' | 'hash'>

export interface AsyncTaskOptions {
  /** Shown in the waiting dialog while the request is sent and the task is queued. */
  message?: string
  policy?: AsyncTaskPolicy
  presentation?: TaskPresentation
  scheduler?: Scheduler
  fetch?: FetchLike
  navigate?: (url: string) => void
  history?: HistoryLike
  location?: LocationLike
  /** Where to send the user when a background request hits a login wall. */
  loginUrl?: string
  onStateChange?: (state: TaskState) => void
  /** Errors that escape the loop itself (a throwing navigate or presentation). */
  onError?: (error: unknown) => void
}

export function toFailureReason(error: unknown): FailureReason {
  if (error instanceof HttpError) return { kind: 'http', status: error.status, body: error.body }
  if (error instanceof MalformedResponseError) return { kind: 'malformed', message: error.message, body: error.body }
  return { kind: 'network', message: error instanceof Error ? error.message : String(error) }
}

/** String-valued fields of a form; file inputs are not supported by background submission. */
export function formFields(form: HTMLFormElement): [string, string][] {
  const fields: [string, string][] = []
  new FormData(form).forEach((value, key) => {
    if (typeof value === 'string') fields.push([key, value])
  })
  return fields
}

function pollingMessage(state: Extract<TaskState, { kind: 'polling' }>): string {
  if (state.degraded) return MESSAGES.degraded
  return state.started ? MESSAGES.started : MESSAGES.queued
}

/**
 * Submit → poll → dispatch loop for one form. All loop state lives here, so two
 * forms on one page never share a task id, timer or in-flight flag.
 */
export class AsyncTaskController {
  private current: TaskState = IDLE
  private cancelTimer: (() => void) | null = null
  private inflight: AbortController | null = null
  private historyWritten = false

  private readonly message: string
  private readonly policy: AsyncTaskPolicy
  private readonly presentation: TaskPresentation
  private readonly scheduler: Scheduler
  private readonly fetchImpl: FetchLike
  private readonly navigate: (url: string) => void
  private readonly history: HistoryLike
  private readonly location: LocationLike
  private readonly loginUrl: string
  private readonly onStateChange?: (state: TaskState) => void
  private readonly onError: (error: unknown) => void

  constructor(
    private readonly form: HTMLFormElement,
    options: AsyncTaskOptions = {}
  ) {
    this.message = options.message ?? MESSAGES.processing
    this.policy = options.policy ?? BACKOFFICE_POLICY
    this.presentation = options.presentation ?? new DomPresentation(form.ownerDocument)
    this.scheduler = options.scheduler ?? timerScheduler
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
    this.navigate = options.navigate ?? ((url) => window.location.assign(url))
    this.history = options.history ?? window.history
    this.location = options.location ?? window.location
    this.loginUrl = options.loginUrl ?? '/login'
    this.onStateChange = options.onStateChange
    this.onError = options.onError ?? reportClientError
  }

  get state(): TaskState {
    return this.current
  }

  /** In-flight flag: a submission request is outstanding. */
  get ajaxing(): boolean {
    return this.current.kind === 'submitting'
  }

  attach(): void {
    this.form.addEventListener('submit', this.handleSubmit)
  }

  detach(): void {
    this.form.removeEventListener('submit', this.handleSubmit)
  }

  /** Start a background submission. Returns false when one is already running. */
  submit(): boolean {
    if (isBusy(this.current)) return false
    return this.dispatch({ type: 'submit' })
  }

  /**
   * Continue polling a task started earlier (page reloaded on its check URL).
   * Returns false while another submission or poll loop owns the form.
   */
  resume(checkUrl: string): boolean {
    if (isBusy(this.current)) return false
    const handle: TaskHandle = {
      taskId: taskIdFromCheckUrl(checkUrl, this.location.href) ?? '',
      checkUrl,
    }
    // the address bar already shows this check URL
    this.historyWritten = true
    return this.dispatch({ type: 'resume', handle })
  }

  /** Stop polling deterministically: pending timer cleared, request aborted, dialog hidden. */
  cancel(): void {
    this.dispatch({ type: 'cancel' })
  }

  private handleSubmit = (event: Event): void => {
    event.preventDefault()
    this.submit()
  }

  private dispatch(event: TaskEvent): boolean {
    const prev = this.current
    const next = transition(prev, event, this.policy)
    if (next === prev) return false
    this.current = next
    this.clearPending()
    if (next.kind === 'submitting') this.form.setAttribute('data-ajaxing', '')
    else this.form.removeAttribute('data-ajaxing')
    this.enter(next, prev)
    this.onStateChange?.(next)
    return true
  }

  private clearPending(): void {
    this.cancelTimer?.()
    this.cancelTimer = null
    this.inflight?.abort()
    this.inflight = null
  }

  private enter(state: TaskState, prev: TaskState): void {
    switch (state.kind) {
      case 'idle':
        this.historyWritten = false
        this.presentation.hide()
        return

      case 'submitting':
        if (prev.kind !== 'submitting') {
          this.historyWritten = false
          this.presentation.hideError()
          this.presentation.setProgress(undefined)
          this.presentation.show(this.message)
        }
        if (state.retryInMs !== undefined) {
          this.cancelTimer = this.scheduler.schedule(() => this.run(this.sendSubmission()), state.retryInMs)
        } else {
          this.run(this.sendSubmission())
        }
        return

      case 'polling':
        if (prev.kind !== 'polling' && prev.kind !== 'submitting') this.presentation.hideError()
        if (!this.historyWritten) {
          this.historyWritten = true
          rememberCheckUrl(this.history, this.checkUrl(state.handle), this.location)
        }
        this.presentation.show(pollingMessage(state))
        this.presentation.setProgress(state.percentage)
        this.cancelTimer = this.scheduler.schedule(() => this.run(this.poll(state.handle)), state.delayMs)
        return

      case 'done':
        this.navigate(state.redirect)
        return

      case 'failed':
        this.presentFailure(state.reason)
        return
    }
  }

  private run(task: Promise<void>): void {
    task.catch(this.onError)
  }

  private actionUrl(): string {
    const action = this.form.getAttribute('action')
    return action ? resolveUrl(action, this.location.href) : this.location.href
  }

  private checkUrl(handle: TaskHandle): string {
    return resolveUrl(handle.checkUrl, this.actionUrl())
  }

  private async sendSubmission(): Promise<void> {
    const controller = new AbortController()
    this.inflight = controller
    let response: SubmitResponse
    try {
      response = await submitForm(this.fetchImpl, this.actionUrl(), formFields(this.form), controller.signal)
    } catch (err) {
      if (controller.signal.aborted) return
      this.inflight = null
      this.dispatch({ type: 'submitFailed', reason: toFailureReason(err) })
      return
    }
    if (controller.signal.aborted) return
    this.inflight = null
    this.dispatch({ type: 'submitted', response })
  }

  private async poll(handle: TaskHandle): Promise<void> {
    const controller = new AbortController()
    this.cancelTimer = null
    this.inflight = controller
    let status: TaskStatus
    try {
      status = await getTaskStatus(this.fetchImpl, this.checkUrl(handle), controller.signal)
    } catch (err) {
      if (controller.signal.aborted) return
      this.inflight = null
      this.dispatch({ type: 'pollFailed', reason: toFailureReason(err) })
      return
    }
    if (controller.signal.aborted) return
    this.inflight = null
    this.dispatch({ type: 'polled', status })
  }

  private presentFailure(reason: FailureReason): void {
    const view = getFailurePresentation(reason)
    if (view.kind === 'login') {
      this.navigate(buildLoginUrl(this.loginUrl, this.location))
      return
    }
    this.presentation.hide()
    if (view.kind === 'fragment') this.presentation.showError(view.html)
    else this.presentation.alert(view.message)
  }
}
