/**
 * Waiting / error dialogs. Invoked by the controller, never invokes it.
 * All methods are idempotent and only touch the DOM.
 */

export interface TaskPresentation {
  show(message: string): void
  hide(): void
  setProgress(percentage: number | undefined): void
  showError(html: string): void
  hideError(): void
  alert(message: string): void
}

const LOADING_CLASS = 'loading'
const ERROR_CLASS = 'has-error'

function ensureChild(parent: HTMLElement, attr: string): HTMLElement {
  const existing = parent.querySelector<HTMLElement>(`[${attr}]`)
  if (existing) return existing
  const el = parent.ownerDocument.createElement('div')
  el.setAttribute(attr, '')
  parent.appendChild(el)
  return el
}

function ensureById(doc: Document, id: string): HTMLElement {
  const existing = doc.getElementById(id)
  if (existing) return existing
  const el = doc.createElement('div')
  el.id = id
  doc.body.appendChild(el)
  return el
}

/**
 * Default presentation: `body.loading` + `#loadingmodal` for the waiting state,
 * `body.has-error` + `#ajaxerr` for errors. Missing elements are created on demand.
 */
export class DomPresentation implements TaskPresentation {
  constructor(
    private readonly doc: Document = document,
    private readonly alertFn: (message: string) => void = (message) => window.alert(message)
  ) {
    // A server-rendered dialog may already have a close button.
    this.doc.addEventListener('click', (event) => {
      const target = event.target
      if (target instanceof Element && target.closest('#ajaxerr .ajaxerr-close')) {
        event.preventDefault()
        this.hideError()
      }
    })
  }

  show(message: string): void {
    const modal = ensureById(this.doc, 'loadingmodal')
    ensureChild(modal, 'data-message').textContent = message
    this.doc.body.classList.add(LOADING_CLASS)
  }

  hide(): void {
    this.doc.body.classList.remove(LOADING_CLASS)
  }

  setProgress(percentage: number | undefined): void {
    const modal = ensureById(this.doc, 'loadingmodal')
    const bar = ensureChild(modal, 'data-progress')
    if (percentage === undefined) {
      bar.hidden = true
      bar.style.width = ''
      return
    }
    const clamped = Math.min(100, Math.max(0, percentage))
    bar.hidden = false
    bar.style.width = `${clamped}%`
  }

  showError(html: string): void {
    const dialog = ensureById(this.doc, 'ajaxerr')
    ensureChild(dialog, 'data-content').innerHTML = html
    this.doc.body.classList.add(ERROR_CLASS)
  }

  hideError(): void {
    this.doc.body.classList.remove(ERROR_CLASS)
  }

  alert(message: string): void {
    this.alertFn(message)
  }
}
