import { z } from 'zod'
import { ValidationError } from './errors'
import type { TaskHandler } from './types'

export const COUNTDOWN_TASK = 'demo.countdown'
export const MAX_COUNTDOWN_SECONDS = 30

export const countdownPayloadSchema = z.object({
  label: z.string().trim().max(100).default(''),
  seconds: z.coerce.number().int().min(0),
})

export const countdownResultSchema = z.object({
  label: z.string(),
  seconds: z.number(),
  finishedAt: z.string(),
})

export type CountdownPayload = z.infer<typeof countdownPayloadSchema>
export type CountdownResult = z.infer<typeof countdownResultSchema>

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Demo task: count down one second at a time, reporting progress.
 * Longer countdowns than MAX_COUNTDOWN_SECONDS fail with a ValidationError
 * (checked in the task, not the form, so the failure travels through the queue).
 */
export function createCountdownTask(sleep: (ms: number) => Promise<void> = defaultSleep): TaskHandler {
  return async (payload, ctx) => {
    const parsed = countdownPayloadSchema.safeParse(payload)
    if (!parsed.success) {
      throw new ValidationError('The countdown settings are invalid.')
    }
    const { label, seconds } = parsed.data
    if (seconds > MAX_COUNTDOWN_SECONDS) {
      throw new ValidationError(`Countdowns longer than ${MAX_COUNTDOWN_SECONDS} seconds are not allowed.`)
    }
    for (let elapsed = 1; elapsed <= seconds; elapsed++) {
      await sleep(1000)
      await ctx.progress(Math.round((elapsed * 100) / seconds))
    }
    const result: CountdownResult = { label, seconds, finishedAt: new Date().toISOString() }
    return result
  }
}
