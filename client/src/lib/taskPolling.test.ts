import { describe, expect, it } from 'vitest'
import { LOGIN_MARKER } from './failureMessage'
import { BACKOFFICE_POLICY, WIDGET_POLICY, type AsyncTaskPolicy } from './taskPolicy'
import { IDLE, isBusy, isTransientPollFailure, transition, type TaskState } from './taskPolling'

const handle = { taskId: 'abc', checkUrl: '/orders/export?async_id=abc&ajax=1' }

const polling: TaskState = { kind: 'polling', handle, delayMs: 250, degraded: false, started: false }

describe('transition', () => {
  it('submits from idle and from failed only', () => {
    expect(transition(IDLE, { type: 'submit' }, BACKOFFICE_POLICY)).toEqual({ kind: 'submitting' })
    const failed: TaskState = { kind: 'failed', reason: { kind: 'network', message: 'offline' } }
    expect(transition(failed, { type: 'submit' }, BACKOFFICE_POLICY)).toEqual({ kind: 'submitting' })

    const submitting: TaskState = { kind: 'submitting' }
    expect(transition(submitting, { type: 'submit' }, BACKOFFICE_POLICY)).toBe(submitting)
    expect(transition(polling, { type: 'submit' }, BACKOFFICE_POLICY)).toBe(polling)
  })

  it('finishes immediately when the submission answers with a redirect', () => {
    const next = transition({ kind: 'submitting' }, { type: 'submitted', response: { redirect: '/done' } }, BACKOFFICE_POLICY)
    expect(next).toEqual({ kind: 'done', redirect: '/done' })
  })

  it('starts polling after the initial delay of the policy', () => {
    const response = { async_id: 'abc', check_url: '/orders/export?async_id=abc&ajax=1', ready: false, started: true, percentage: 10 }
    expect(transition({ kind: 'submitting' }, { type: 'submitted', response }, BACKOFFICE_POLICY)).toEqual({
      kind: 'polling',
      handle,
      delayMs: 250,
      degraded: false,
      started: true,
      percentage: 10,
    })
    const widget = transition({ kind: 'submitting' }, { type: 'submitted', response }, WIDGET_POLICY)
    expect(widget.kind === 'polling' && widget.delayMs).toBe(100)
  })

  it('keeps polling at the regular delay while the task is not ready', () => {
    const next = transition(polling, { type: 'polled', status: { ready: false, started: true, percentage: 40 } }, BACKOFFICE_POLICY)
    expect(next).toEqual({ ...polling, delayMs: 500, started: true, percentage: 40 })
  })

  it('keeps polling when the task is ready but names no redirect', () => {
    const next = transition(polling, { type: 'polled', status: { ready: true } }, BACKOFFICE_POLICY)
    expect(next.kind).toBe('polling')
  })

  it('finishes when the task is ready with a redirect', () => {
    const next = transition(polling, { type: 'polled', status: { ready: true, redirect: '/done', success: true } }, BACKOFFICE_POLICY)
    expect(next).toEqual({ kind: 'done', redirect: '/done' })
  })

  it('waits out server errors and network failures while polling', () => {
    const server = transition(polling, { type: 'pollFailed', reason: { kind: 'http', status: 502, body: '' } }, BACKOFFICE_POLICY)
    expect(server).toEqual({ ...polling, delayMs: 5000, degraded: true })

    const network = transition(polling, { type: 'pollFailed', reason: { kind: 'network', message: 'offline' } }, WIDGET_POLICY)
    expect(network).toEqual({ ...polling, delayMs: 1000, degraded: true })
  })

  it('clears the degraded flag on the next good answer', () => {
    const degraded: TaskState = { ...polling, delayMs: 5000, degraded: true }
    const next = transition(degraded, { type: 'polled', status: { ready: false } }, BACKOFFICE_POLICY)
    expect(next).toEqual({ ...polling, delayMs: 500, degraded: false, percentage: undefined })
  })

  it('fails on client errors while polling', () => {
    const forbidden = { kind: 'http' as const, status: 403, body: '<div class="container">No</div>' }
    expect(transition(polling, { type: 'pollFailed', reason: forbidden }, BACKOFFICE_POLICY)).toEqual({ kind: 'failed', reason: forbidden })
  })

  it('treats a malformed status answer like a network failure', () => {
    const malformed = { kind: 'malformed' as const, message: 'Unexpected token', body: '<html></html>' }
    expect(transition(polling, { type: 'pollFailed', reason: malformed }, BACKOFFICE_POLICY)).toEqual({ ...polling, delayMs: 5000, degraded: true })
  })

  it('fails when a status check lands on the login page', () => {
    const loginPage = { kind: 'malformed' as const, message: 'Unexpected token', body: `<html>${LOGIN_MARKER}</html>` }
    expect(transition(polling, { type: 'pollFailed', reason: loginPage }, BACKOFFICE_POLICY)).toEqual({ kind: 'failed', reason: loginPage })

    const redirected = { kind: 'http' as const, status: 502, body: `<html>${LOGIN_MARKER}</html>` }
    expect(transition(polling, { type: 'pollFailed', reason: redirected }, BACKOFFICE_POLICY)).toEqual({ kind: 'failed', reason: redirected })
  })

  it('fails a submission on 5xx unless the policy retries it', () => {
    const reason = { kind: 'http' as const, status: 500, body: '' }
    expect(transition({ kind: 'submitting' }, { type: 'submitFailed', reason }, BACKOFFICE_POLICY)).toEqual({ kind: 'failed', reason })

    const retrying: AsyncTaskPolicy = { ...BACKOFFICE_POLICY, submitServerError: 'retry' }
    expect(transition({ kind: 'submitting' }, { type: 'submitFailed', reason }, retrying)).toEqual({ kind: 'submitting', retryInMs: 5000 })

    const badRequest = { kind: 'http' as const, status: 400, body: '' }
    expect(transition({ kind: 'submitting' }, { type: 'submitFailed', reason: badRequest }, retrying)).toEqual({ kind: 'failed', reason: badRequest })
  })

  it('resumes polling from idle', () => {
    expect(transition(IDLE, { type: 'resume', handle }, WIDGET_POLICY)).toEqual({
      kind: 'polling',
      handle,
      delayMs: 100,
      degraded: false,
      started: false,
    })
    expect(transition(polling, { type: 'resume', handle }, WIDGET_POLICY)).toBe(polling)
  })

  it('cancels to idle from any running state', () => {
    expect(transition(polling, { type: 'cancel' }, BACKOFFICE_POLICY)).toBe(IDLE)
    expect(transition({ kind: 'submitting' }, { type: 'cancel' }, BACKOFFICE_POLICY)).toBe(IDLE)
  })

  it('ignores everything once done', () => {
    const done: TaskState = { kind: 'done', redirect: '/done' }
    expect(transition(done, { type: 'submit' }, BACKOFFICE_POLICY)).toBe(done)
    expect(transition(done, { type: 'cancel' }, BACKOFFICE_POLICY)).toBe(done)
    expect(transition(done, { type: 'polled', status: { ready: true, redirect: '/other' } }, BACKOFFICE_POLICY)).toBe(done)
  })

  it('ignores answers that arrive in the wrong state', () => {
    expect(transition(IDLE, { type: 'polled', status: { ready: true, redirect: '/done' } }, BACKOFFICE_POLICY)).toBe(IDLE)
    expect(transition(IDLE, { type: 'submitted', response: { redirect: '/done' } }, BACKOFFICE_POLICY)).toBe(IDLE)
  })
})

describe('helpers', () => {
  it('treats everything but 4xx as transient', () => {
    expect(isTransientPollFailure({ kind: 'http', status: 503, body: '' })).toBe(true)
    expect(isTransientPollFailure({ kind: 'network', message: 'offline' })).toBe(true)
    expect(isTransientPollFailure({ kind: 'malformed', message: 'x', body: '' })).toBe(true)
    expect(isTransientPollFailure({ kind: 'http', status: 404, body: '' })).toBe(false)
  })

  it('reports busy while a request or poll loop runs', () => {
    expect(isBusy(IDLE)).toBe(false)
    expect(isBusy({ kind: 'submitting' })).toBe(true)
    expect(isBusy(polling)).toBe(true)
  })
})
