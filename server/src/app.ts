import path from 'path'
import fs from 'fs'
import express, { Request, Response, NextFunction } from 'express'
import cors from 'cors'
import rateLimit from 'express-rate-limit'
import { env } from './env'
import { getLogger, withRequestId } from './lib/logger'
import { sentryRequestIdScope, setupSentryErrorHandler } from './lib/sentry'
import { renderErrorPage } from './lib/templates'
import { getRequestId, requestIdMiddleware } from './middleware/requestId'
import { createDemoRouter } from './routes/demo'
import { createHealthRouter } from './routes/health'
import { UNEXPECTED_ERROR_MESSAGE } from './routes/asyncAction'
import type { TaskBackend } from './tasks/types'

export const SCRIPT_URL = '/static/formtask.js'

export interface AppOptions {
  backend: TaskBackend
  /** Form submissions per client and minute. */
  submitRateLimit?: number
  /** Extra origins allowed to post forms (embedded widgets). */
  corsOrigins?: string[]
  /** Built client bundle (client/dist); served under /static when present. */
  clientDist?: string
}

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/$/, '') // trim and strip trailing slash
}

export function parseOrigins(raw: string): string[] {
  return raw.split(',').map(normalizeOrigin).filter(Boolean)
}

export function createApp(options: AppOptions): express.Express {
  const { backend } = options
  const allowedOrigins = new Set((options.corsOrigins ?? parseOrigins(env.CORS_ORIGINS)).map(normalizeOrigin))
  const clientDist = options.clientDist ?? env.CLIENT_DIST ?? path.join(__dirname, '..', '..', 'client', 'dist')

  const app = express()
  app.disable('etag')
  app.disable('x-powered-by')
  // Trust one proxy hop so rate limiting sees the client address behind the edge proxy
  app.set('trust proxy', 1)

  // Same-origin forms need no CORS; embedded widgets on allow-listed sites post with credentials
  app.use(
    cors({
      origin: (origin, callback) => {
        callback(null, !origin || allowedOrigins.has(normalizeOrigin(origin)))
      },
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Accept', 'X-Requested-With', 'X-Request-Id'],
      credentials: true,
      optionsSuccessStatus: 204,
    })
  )

  // Request ID: correlate form → API → worker (read from edge or generate)
  app.use(requestIdMiddleware)
  app.use(sentryRequestIdScope)

  app.use(
    rateLimit({
      windowMs: 60 * 1000,
      limit: options.submitRateLimit ?? 30,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.method !== 'POST',
      handler: (_req, res) => {
        res.status(429).type('html').send(renderErrorPage('Too many requests', ['You submitted too many requests. Please wait a minute and try again.']))
      },
    })
  )

  app.use(express.urlencoded({ extended: false }))
  app.use(express.json())

  app.use(createHealthRouter(backend))
  app.use(createDemoRouter(backend, SCRIPT_URL))

  if (fs.existsSync(clientDist)) {
    app.use('/static', express.static(clientDist, { index: false }))
  }

  app.use((_req: Request, res: Response) => {
    res.status(404).type('html').send(renderErrorPage('Not found', ['The page you requested does not exist.']))
  })

  // Sentry error handler (after all routes; captures errors and passes them on)
  setupSentryErrorHandler(app)

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    withRequestId(getRequestId(req)).error({ msg: 'Request failed', method: req.method, path: req.path, err })
    if (res.headersSent) {
      next(err)
      return
    }
    res.status(500).type('html').send(renderErrorPage('Server error', [UNEXPECTED_ERROR_MESSAGE]))
  })

  getLogger('api').debug({ msg: 'App created', backend: backend.kind, allowedOrigins: Array.from(allowedOrigins) })
  return app
}
