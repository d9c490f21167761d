/**
 * Health, readiness and version endpoints.
 */
import { Router, Request, Response } from 'express'
import { env } from '../env'
import type { TaskBackend } from '../tasks/types'

const BUILD_TIME = process.env.BUILD_TIME || undefined
const READYZ_TIMEOUT_MS = 5_000

function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  return Promise.race([
    p,
    new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms)
    }),
  ]).finally(() => clearTimeout(timer))
}

export function createHealthRouter(backend: TaskBackend): Router {
  const router = Router()

  /** GET /healthz: process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /readyz: 200 only if the task queue answers; 503 with details if not. */
  router.get('/readyz', async (_req: Request, res: Response) => {
    try {
      await withTimeout(backend.ping(), READYZ_TIMEOUT_MS, 'Task queue')
    } catch (err) {
      res.status(503).json({ status: 'unhealthy', queue: err instanceof Error ? err.message : 'Task queue unreachable' })
      return
    }
    res.status(200).json({ status: 'ok', backend: backend.kind })
  })

  /** GET /version: service, release, buildTime, env */
  router.get('/version', (_req: Request, res: Response) => {
    res.json({
      service: 'api',
      release: env.RELEASE,
      buildTime: BUILD_TIME,
      env: env.NODE_ENV,
    })
  })

  return router
}
