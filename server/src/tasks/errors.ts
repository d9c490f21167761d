import type { TaskErrorInfo } from './types'

/**
 * Expected task failure. `type` is matched against an action's known error types;
 * a match shows `message` to the user, anything else gets a generic message.
 */
export class TaskError extends Error {
  constructor(
    public readonly type: string,
    message: string
  ) {
    super(message)
    this.name = type
  }
}

/** Raised when a form payload fails validation inside the task. */
export class ValidationError extends TaskError {
  constructor(message: string) {
    super('ValidationError', message)
  }
}

/** Raised by backends when the queue itself is unreachable. */
export class QueueConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'QueueConnectionError'
  }
}

export function toTaskErrorInfo(err: unknown): TaskErrorInfo {
  if (err instanceof TaskError) return { type: err.type, message: err.message }
  if (err instanceof Error) return { type: err.name || 'Error', message: err.message }
  return { type: 'Error', message: String(err) }
}
