/**
 * Async action: a form POST that runs as a background task.
 *
 * AJAX clients (ajax=1 in query or body) get JSON:
 *   POST → { async_id, ready, started, check_url, [redirect, success, message] }
 *   GET ?async_id=…&ajax=1 → { async_id, ready, started, [percentage], [redirect, success, message] }
 * Plain browsers get redirects: to the result once ready, otherwise to the check URL,
 * which renders a waiting page that resumes polling with JavaScript.
 */
import express, { Request, Response, NextFunction } from 'express'
import type { z } from 'zod'
import { withRequestId } from '../lib/logger'
import { renderErrorPage, renderTemplate } from '../lib/templates'
import { getRequestId } from '../middleware/requestId'
import type { TaskBackend, TaskErrorInfo, TaskSnapshot } from '../tasks/types'

/** How long a submission waits for a fast task before answering with a handle. */
export const SUBMIT_WAIT_MS = 500
/** How long a status check waits for the task before answering "not ready". */
export const POLL_WAIT_MS = 250

export const DEFAULT_SUCCESS_MESSAGE = 'The task has been completed.'
export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error has occurred, please try again later.'
export const WAITING_MESSAGE = 'We are processing your request …'

const NO_STORE_HEADERS = {
  'Cache-Control': 'no-store, no-cache, must-revalidate, proxy-revalidate',
  Pragma: 'no-cache',
  Expires: '0',
}

export interface AsyncResultBody {
  async_id: string
  ready: boolean
  started?: boolean
  percentage?: number
  redirect?: string
  success?: boolean
  message?: string
  check_url?: string
}

export interface AsyncActionOptions<S extends z.ZodTypeAny> {
  /** Registered task name. */
  task: string
  backend: TaskBackend
  /** Validates the urlencoded form body; the parsed value is the task payload. */
  schema: S
  successUrl: (value: unknown, req: Request) => string
  errorUrl: (req: Request) => string
  /** Error types whose message is shown to the user as is. */
  knownErrorTypes?: string[]
  successMessage?: (value: unknown) => string
  /** Script included by the waiting page to resume polling. */
  scriptUrl?: string
}

export function isAjax(req: Request): boolean {
  if (req.query.ajax !== undefined) return true
  const body: unknown = req.body
  return typeof body === 'object' && body !== null && 'ajax' in body
}

/** Path of the current request plus ?async_id=…[&ajax=1]. */
export function buildCheckUrl(req: Request, taskId: string, ajax: boolean): string {
  const path = req.originalUrl.split('?')[0]
  return `${path}?async_id=${encodeURIComponent(taskId)}${ajax ? '&ajax=1' : ''}`
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>

function asyncRoute(fn: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next)
  }
}

export function createAsyncAction<S extends z.ZodTypeAny>(options: AsyncActionOptions<S>): express.Router {
  const {
    task,
    backend,
    schema,
    successUrl,
    errorUrl,
    knownErrorTypes = ['ValidationError'],
    successMessage = () => DEFAULT_SUCCESS_MESSAGE,
    scriptUrl = '/static/formtask.js',
  } = options
  const router = express.Router()

  function errorMessage(req: Request, snapshot: TaskSnapshot, error: TaskErrorInfo | undefined): string {
    if (error && knownErrorTypes.includes(error.type)) return error.message
    withRequestId(getRequestId(req)).error({
      msg: 'Unexpected task error',
      task,
      taskId: snapshot.id,
      errorType: error?.type,
      error: error?.message,
    })
    return UNEXPECTED_ERROR_MESSAGE
  }

  /** Where a finished task sends the browser, and what to tell the user. */
  function outcome(req: Request, snapshot: TaskSnapshot): { redirect: string; success: boolean; message: string } {
    if (snapshot.state === 'SUCCESS') {
      return { redirect: successUrl(snapshot.value, req), success: true, message: successMessage(snapshot.value) }
    }
    return { redirect: errorUrl(req), success: false, message: errorMessage(req, snapshot, snapshot.error) }
  }

  function resultBody(req: Request, snapshot: TaskSnapshot): AsyncResultBody {
    const body: AsyncResultBody = { async_id: snapshot.id, ready: snapshot.ready, started: false }
    if (snapshot.ready) {
      return { ...body, ...outcome(req, snapshot) }
    }
    if (snapshot.state === 'PROGRESS') {
      return { ...body, started: true, percentage: snapshot.percentage ?? 0 }
    }
    if (snapshot.state === 'STARTED') {
      return { ...body, started: true }
    }
    return body
  }

  function sendNotFound(res: Response): void {
    res
      .status(404)
      .set(NO_STORE_HEADERS)
      .type('html')
      .send(renderErrorPage('Task not found', ['This task is unknown or its result has expired. Please try again.']))
  }

  router.post(
    '/',
    asyncRoute(async (req, res) => {
      const log = withRequestId(getRequestId(req))
      const parsed = schema.safeParse(req.body ?? {})
      if (!parsed.success) {
        const messages = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
        res.status(400).type('html').send(renderErrorPage('Please check your input', messages))
        return
      }

      const { id } = await backend.enqueue(task, parsed.data, { requestId: getRequestId(req) })
      log.info({ msg: 'Task enqueued', task, taskId: id, backend: backend.kind })
      const snapshot: TaskSnapshot = (await backend.wait(id, SUBMIT_WAIT_MS)) ?? { id, name: task, state: 'PENDING', ready: false }

      if (isAjax(req)) {
        res.set(NO_STORE_HEADERS).json({ ...resultBody(req, snapshot), check_url: buildCheckUrl(req, id, true) })
        return
      }
      if (snapshot.ready) {
        res.redirect(303, outcome(req, snapshot).redirect)
        return
      }
      res.redirect(303, buildCheckUrl(req, id, false))
    })
  )

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const taskId = typeof req.query.async_id === 'string' ? req.query.async_id : ''
      if (!taskId) {
        res.set('Allow', 'POST').status(405).type('html').send(renderErrorPage('Method not allowed', ['Please submit the form.']))
        return
      }

      if (isAjax(req)) {
        let snapshot: TaskSnapshot | null
        try {
          snapshot = await backend.wait(taskId, POLL_WAIT_MS)
        } catch (err) {
          // Queue probably just restarted; report not ready and let the client ask again.
          withRequestId(getRequestId(req)).warn({ msg: 'Task status unavailable', task, taskId, err })
          res.set(NO_STORE_HEADERS).json({ async_id: taskId, ready: false } satisfies AsyncResultBody)
          return
        }
        if (!snapshot) {
          sendNotFound(res)
          return
        }
        res.set(NO_STORE_HEADERS).json(resultBody(req, snapshot))
        return
      }

      const snapshot = await backend.get(taskId)
      if (!snapshot) {
        sendNotFound(res)
        return
      }
      if (snapshot.ready) {
        res.redirect(outcome(req, snapshot).redirect)
        return
      }
      res.set(NO_STORE_HEADERS).type('html').send(renderTemplate('waiting', { message: WAITING_MESSAGE, scriptUrl }))
    })
  )

  return router
}
