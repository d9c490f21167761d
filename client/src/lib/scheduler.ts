/** Deferred-callback primitive for the poll loop; injectable so tests control time. */
export interface Scheduler {
  /** Run `fn` after `delayMs`. The returned function cancels it if it has not run yet. */
  schedule(fn: () => void, delayMs: number): () => void
}

export const timerScheduler: Scheduler = {
  schedule(fn, delayMs) {
    const id = setTimeout(fn, delayMs)
    return () => clearTimeout(id)
  },
}
