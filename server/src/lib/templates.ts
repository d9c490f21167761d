/**
 * Minimal HTML templates from src/templates/*.html.
 * {{name}} is HTML-escaped, {{{name}}} is inserted as is (for markup built by the caller).
 */
import fs from 'fs'
import path from 'path'

const TEMPLATE_DIR = path.join(__dirname, '..', 'templates')
const cache = new Map<string, string>()

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

function load(name: string): string {
  let source = cache.get(name)
  if (source === undefined) {
    source = fs.readFileSync(path.join(TEMPLATE_DIR, `${name}.html`), 'utf8')
    cache.set(name, source)
  }
  return source
}

export function renderTemplate(name: string, vars: Record<string, string> = {}): string {
  return load(name).replace(/\{\{(\{)?\s*(\w+)\s*\}?\}\}/g, (_match, raw: string | undefined, key: string) => {
    const value = vars[key] ?? ''
    return raw ? value : escapeHtml(value)
  })
}

/** Error page whose `.container` holds the message; background requests show that fragment. */
export function renderErrorPage(title: string, messages: string[]): string {
  const items = messages.map((m) => `<li>${escapeHtml(m)}</li>`).join('')
  return renderTemplate('error', { title, messagesHtml: `<ul class="errors">${items}</ul>` })
}
