/**
 * Keep the status-check URL in the address bar while a task runs, so a reload
 * resumes polling instead of re-submitting the form.
 * - The ajax marker is stripped: a plain GET on the check URL renders the waiting page.
 * - The waiting page hands the URL back (with the marker) via findResumableCheckUrl.
 */
import { AJAX_MARKER } from './api'
import { toRelativeUrl } from './apiBase'

const TASK_ID_PARAM = 'async_id'

export type HistoryLike = Pick<History, 'replaceState'>

/** Remove every `ajax` query parameter from a URL, keeping everything else in order. */
export function stripAjaxMarker(url: string, base: string): string {
  const u = new URL(url, base)
  u.searchParams.delete(AJAX_MARKER)
  return u.toString()
}

/**
 * Replace the current history entry with the check URL (without the marker).
 * Returns false when the check URL lives on another origin, where replaceState would throw.
 */
export function rememberCheckUrl(history: HistoryLike, checkUrl: string, location: Pick<Location, 'href' | 'origin'>): boolean {
  const stripped = stripAjaxMarker(checkUrl, location.href)
  if (new URL(stripped).origin !== location.origin) return false
  history.replaceState(null, '', toRelativeUrl(stripped, location.origin))
  return true
}

/** When the page was loaded on a check URL (?async_id=...), the same URL with ajax=1; otherwise null. */
export function findResumableCheckUrl(location: Pick<Location, 'href'>): string | null {
  const url = new URL(location.href)
  if (!url.searchParams.get(TASK_ID_PARAM)) return null
  url.searchParams.set(AJAX_MARKER, '1')
  url.hash = ''
  return url.toString()
}

/** Task id carried by a check URL, if any. */
export function taskIdFromCheckUrl(checkUrl: string, base: string): string | null {
  return new URL(checkUrl, base).searchParams.get(TASK_ID_PARAM)
}
