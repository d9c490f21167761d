/**
 * Background task contract shared by the API (enqueue, status) and the worker (run).
 *
 * States follow the usual task-queue vocabulary:
 *   PENDING  → queued, not picked up yet (or unknown to a backend that lost it)
 *   STARTED  → a worker is running it
 *   PROGRESS → running and reported a percentage
 *   SUCCESS / FAILURE → finished; `ready` is true
 */
export type TaskState = 'PENDING' | 'STARTED' | 'PROGRESS' | 'SUCCESS' | 'FAILURE'

export interface TaskErrorInfo {
  /** Error class name, e.g. ValidationError. Decides whether the message is shown to the user. */
  type: string
  message: string
}

export interface TaskSnapshot<R = unknown> {
  id: string
  name: string
  state: TaskState
  ready: boolean
  value?: R
  error?: TaskErrorInfo
  percentage?: number
}

export interface TaskMeta {
  requestId?: string
}

export interface TaskContext {
  taskId: string
  /** Report progress in percent (0–100). Moves the task to PROGRESS. */
  progress(percentage: number): Promise<void>
}

export type TaskHandler<P = unknown, R = unknown> = (payload: P, ctx: TaskContext) => Promise<R>

export interface TaskBackend {
  readonly kind: 'bull' | 'inline'
  enqueue(name: string, payload: unknown, meta?: TaskMeta): Promise<{ id: string }>
  get(id: string): Promise<TaskSnapshot | null>
  /** Snapshot once the task is ready or after timeoutMs, whichever comes first. */
  wait(id: string, timeoutMs: number): Promise<TaskSnapshot | null>
  ping(): Promise<void>
  close(): Promise<void>
}

/** What a handler run leaves behind, stored by backends that serialise results. */
export type TaskOutcome<R = unknown> = { ok: true; value: R } | { ok: false; error: TaskErrorInfo }

export function isReadyState(state: TaskState): boolean {
  return state === 'SUCCESS' || state === 'FAILURE'
}
