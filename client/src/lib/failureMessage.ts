/**
 * Turn a failed submission or status check into something to show the user.
 * Display layer only: no requests, no state changes.
 */
import type { FailureReason } from './taskPolling'

/** Pages that require a login carry this comment so background requests can send the user there. */
export const LOGIN_MARKER = '<!-- formtask-login-marker -->'

/** Selector of the element whose inner HTML is the user-facing error fragment. */
export const ERROR_CONTAINER_SELECTOR = '.container'

export type FailurePresentation =
  | { kind: 'login' }
  | { kind: 'fragment'; html: string }
  | { kind: 'alert'; message: string }

export function httpErrorMessage(status: number): string {
  return `An error of type ${status} occurred.`
}

export const NETWORK_ERROR_MESSAGE = 'We could not reach the server. Please check your internet connection and try again.'
export const MALFORMED_RESPONSE_MESSAGE = 'The server sent an unexpected response. Please reload the page and try again.'

/**
 * The answer is a login page. It may arrive as an error status or, after the
 * server redirected to the login form, as a 200 HTML page.
 */
export function requiresLogin(reason: FailureReason): boolean {
  return reason.kind !== 'network' && reason.body.includes(LOGIN_MARKER)
}

/** Inner HTML of the first error container in an HTML document or fragment, or null. */
export function extractErrorFragment(html: string, selector: string = ERROR_CONTAINER_SELECTOR): string | null {
  if (!html.trim()) return null
  const doc = new DOMParser().parseFromString(html, 'text/html')
  const el = doc.querySelector(selector)
  return el ? el.innerHTML : null
}

export function getFailurePresentation(reason: FailureReason): FailurePresentation {
  if (requiresLogin(reason)) return { kind: 'login' }
  if (reason.kind === 'network') return { kind: 'alert', message: NETWORK_ERROR_MESSAGE }
  if (reason.kind === 'malformed') return { kind: 'alert', message: MALFORMED_RESPONSE_MESSAGE }
  const fragment = extractErrorFragment(reason.body)
  if (fragment !== null) return { kind: 'fragment', html: fragment }
  return { kind: 'alert', message: httpErrorMessage(reason.status) }
}

/** Login page URL with ?next= pointing back at the current page. */
export function buildLoginUrl(loginUrl: string, location: Pick<Location, 'pathname' | 'search' | 'hash'>): string {
  const next = location.pathname + location.search + location.hash
  const sep = loginUrl.includes('?') ? '&' : '?'
  return `${loginUrl}${sep}next=${encodeURIComponent(next)}`
}
