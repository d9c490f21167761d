/**
 * URL helpers for the async task contract.
 * - The server may answer with a path (/orders/export?async_id=...) or an absolute URL.
 * - Paths are resolved against the page the form lives on, so an embedded form
 *   (widget on a foreign page) still polls its own origin.
 */

/** Resolve a path or absolute URL against a base URL (origin of the form action). */
export function resolveUrl(pathOrUrl: string, base: string): string {
  return new URL(pathOrUrl, base).toString()
}

/** Relative form of a URL (path + query + hash) when it lives on the given origin. */
export function toRelativeUrl(url: string, origin: string): string {
  const u = new URL(url, origin)
  if (u.origin !== origin) return u.toString()
  return u.pathname + u.search + u.hash
}
