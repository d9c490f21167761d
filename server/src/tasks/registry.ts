import type { TaskHandler } from './types'

/** Named task handlers. The API only needs the names; the worker runs the handlers. */
export class TaskRegistry {
  private readonly handlers = new Map<string, TaskHandler>()

  /** Payloads arrive as plain JSON, so handlers take `unknown` and validate their own input. */
  register(name: string, handler: TaskHandler): this {
    if (this.handlers.has(name)) {
      throw new Error(`Task already registered: ${name}`)
    }
    this.handlers.set(name, handler)
    return this
  }

  get(name: string): TaskHandler | undefined {
    return this.handlers.get(name)
  }

  has(name: string): boolean {
    return this.handlers.has(name)
  }

  names(): string[] {
    return Array.from(this.handlers.keys())
  }
}
