import type { SubmitResponse, TaskStatus } from './api'
import { requiresLogin } from './failureMessage'
import type { AsyncTaskPolicy } from './taskPolicy'

/** Identifier plus status-check URL of a running background task. */
export interface TaskHandle {
  taskId: string
  checkUrl: string
}

export type FailureReason =
  | { kind: 'http'; status: number; body: string }
  | { kind: 'network'; message: string }
  | { kind: 'malformed'; message: string; body: string }

export type TaskState =
  | { kind: 'idle' }
  | { kind: 'submitting'; retryInMs?: number }
  | {
      kind: 'polling'
      handle: TaskHandle
      delayMs: number
      /** Last attempt hit a 5xx or the network; the wait is longer than usual. */
      degraded: boolean
      started: boolean
      percentage?: number
    }
  | { kind: 'done'; redirect: string }
  | { kind: 'failed'; reason: FailureReason }

export type TaskEvent =
  | { type: 'submit' }
  | { type: 'submitted'; response: SubmitResponse }
  | { type: 'submitFailed'; reason: FailureReason }
  | { type: 'resume'; handle: TaskHandle }
  | { type: 'polled'; status: TaskStatus }
  | { type: 'pollFailed'; reason: FailureReason }
  | { type: 'cancel' }

export const IDLE: TaskState = { kind: 'idle' }

export function isServerError(reason: FailureReason): boolean {
  return reason.kind === 'http' && reason.status >= 500 && reason.status <= 599
}

/**
 * Poll failures we wait out: the server is overloaded, the connection dropped, or a
 * proxy answered with something that is not our JSON. 4xx and login pages end the loop.
 */
export function isTransientPollFailure(reason: FailureReason): boolean {
  if (requiresLogin(reason)) return false
  return reason.kind !== 'http' || isServerError(reason)
}

/** A submission is in flight or a poll loop is running for this form. */
export function isBusy(state: TaskState): boolean {
  return state.kind === 'submitting' || state.kind === 'polling' || state.kind === 'done'
}

/**
 * Async task state machine. Lifecycle depends only on the event and the current state:
 *
 *   idle ──submit──▶ submitting ──{redirect}──▶ done
 *                        │
 *                        └──{async_id, check_url}──▶ polling ◀─┐ not ready / 5xx / network / malformed
 *                                                      │  └────┘
 *                                                      ├──ready + redirect──▶ done
 *                                                      └──4xx / login page──▶ failed
 *
 * `done` is terminal and ignores everything. `failed` and `idle` accept a new submit.
 * Events that do not belong to the current state return it unchanged.
 */
export function transition(state: TaskState, event: TaskEvent, policy: AsyncTaskPolicy): TaskState {
  if (state.kind === 'done') return state

  switch (event.type) {
    case 'submit':
      if (state.kind === 'idle' || state.kind === 'failed') return { kind: 'submitting' }
      return state

    case 'cancel':
      return IDLE

    case 'resume':
      if (state.kind !== 'idle' && state.kind !== 'failed') return state
      return {
        kind: 'polling',
        handle: event.handle,
        delayMs: policy.initialDelayMs,
        degraded: false,
        started: false,
      }

    case 'submitted': {
      if (state.kind !== 'submitting') return state
      const response = event.response
      if ('redirect' in response) return { kind: 'done', redirect: response.redirect }
      return {
        kind: 'polling',
        handle: { taskId: response.async_id, checkUrl: response.check_url },
        delayMs: policy.initialDelayMs,
        degraded: false,
        started: response.started ?? false,
        percentage: response.percentage,
      }
    }

    case 'submitFailed':
      if (state.kind !== 'submitting') return state
      if (isServerError(event.reason) && policy.submitServerError === 'retry') {
        return { kind: 'submitting', retryInMs: policy.serverErrorDelayMs }
      }
      return { kind: 'failed', reason: event.reason }

    case 'polled':
      if (state.kind !== 'polling') return state
      if (event.status.ready && event.status.redirect) {
        return { kind: 'done', redirect: event.status.redirect }
      }
      return {
        ...state,
        delayMs: policy.pollDelayMs,
        degraded: false,
        started: event.status.started ?? state.started,
        percentage: event.status.percentage,
      }

    case 'pollFailed':
      if (state.kind !== 'polling') return state
      if (isTransientPollFailure(event.reason)) {
        return { ...state, delayMs: policy.serverErrorDelayMs, degraded: true }
      }
      return { kind: 'failed', reason: event.reason }
  }
}
