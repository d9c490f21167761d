import { Router, Request, Response } from 'express'
import { renderTemplate } from '../lib/templates'
import { COUNTDOWN_TASK, countdownPayloadSchema, countdownResultSchema } from '../tasks/countdown'
import type { TaskBackend } from '../tasks/types'
import { createAsyncAction } from './asyncAction'

/** Demo pages: a countdown form at /demo, its async action at /demo/countdown. */
export function createDemoRouter(backend: TaskBackend, scriptUrl: string): Router {
  const router = Router()

  router.get('/demo', (req: Request, res: Response) => {
    const label = typeof req.query.finished === 'string' ? req.query.finished : ''
    const notice = label ? `Countdown "${label}" finished.` : 'Start a countdown; it runs as a background task.'
    res.type('html').send(renderTemplate('demo', { notice, scriptUrl }))
  })

  router.use(
    '/demo/countdown',
    createAsyncAction({
      task: COUNTDOWN_TASK,
      backend,
      schema: countdownPayloadSchema,
      scriptUrl,
      successUrl: (value) => {
        const result = countdownResultSchema.safeParse(value)
        const label = result.success && result.data.label ? result.data.label : 'countdown'
        return `/demo?finished=${encodeURIComponent(label)}`
      },
      errorUrl: () => '/demo',
      successMessage: () => 'Your countdown has finished.',
    })
  )

  return router
}
