/**
 * Load and validate process configuration. Import before anything that reads it
 * (logger, Sentry, Redis). Every key has a default so tests and local runs need no .env.
 */
import 'dotenv/config'
import { z } from 'zod'

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((v) => v === 'true' || v === '1')

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3001),

  // Task queue: bull needs Redis; inline runs tasks inside the API process
  REDIS_URL: z.string().url().optional(),
  TASK_BACKEND: z.enum(['bull', 'inline']).optional(),
  DISABLE_WORKER: booleanFlag,
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  RELEASE: z.string().default('dev'),
  SENTRY_DSN: z.string().optional(),

  // Comma-separated extra origins allowed to post forms (embedded widgets)
  CORS_ORIGINS: z.string().default(''),
  CLIENT_DIST: z.string().optional(),
})

export type Env = z.infer<typeof envSchema>

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source)

  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid environment configuration: ${details}`)
  }

  return result.data
}

/** Backend to use: explicit TASK_BACKEND wins, otherwise bull when Redis is configured. */
export function resolveTaskBackend(env: Env): 'bull' | 'inline' {
  if (env.TASK_BACKEND) return env.TASK_BACKEND
  return env.REDIS_URL ? 'bull' : 'inline'
}

export const env = loadEnv()
