import { z } from 'zod'

/** Marker field sent with every background submission and status check. */
export const AJAX_MARKER = 'ajax'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

/** Non-2xx answer from the server. `body` is the raw response text (often an HTML page). */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super(`Request failed with status ${status}`)
    this.name = 'HttpError'
  }
}

/**
 * 2xx answer whose body is not JSON or does not match the expected shape.
 * `body` is the raw text: a login page reached through a redirect lands here.
 */
export class MalformedResponseError extends Error {
  constructor(
    message: string,
    public readonly body: string = ''
  ) {
    super(message)
    this.name = 'MalformedResponseError'
  }
}

const redirectSchema = z.object({
  redirect: z.string().min(1),
  success: z.boolean().optional(),
  message: z.string().optional(),
})

const handleSchema = z.object({
  async_id: z.string().min(1),
  check_url: z.string().min(1),
  ready: z.boolean().optional(),
  started: z.boolean().optional(),
  percentage: z.number().optional(),
})

/**
 * Submission answer: either the task already finished (or never needed one) and
 * we get a redirect, or we get a handle to poll.
 */
export const submitResponseSchema = z.union([redirectSchema, handleSchema])

export const taskStatusSchema = z.object({
  ready: z.boolean(),
  redirect: z.string().min(1).optional(),
  success: z.boolean().optional(),
  message: z.string().optional(),
  started: z.boolean().optional(),
  percentage: z.number().optional(),
  async_id: z.string().optional(),
})

export type SubmitResponse = z.infer<typeof submitResponseSchema>
export type TaskStatus = z.infer<typeof taskStatusSchema>

const JSON_HEADERS = {
  Accept: 'application/json',
  'X-Requested-With': 'XMLHttpRequest',
}

async function readJson<T>(response: Response, schema: z.ZodType<T>): Promise<T> {
  if (!response.ok) {
    throw new HttpError(response.status, await response.text())
  }
  const text = await response.text()
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new MalformedResponseError(err instanceof Error ? err.message : 'Response is not JSON', text)
  }
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new MalformedResponseError(parsed.error.issues.map((i) => i.message).join('; '), text)
  }
  return parsed.data
}

/** Form fields plus the `ajax=1` marker, urlencoded. */
export function buildSubmitBody(fields: Iterable<[string, string]>): URLSearchParams {
  const body = new URLSearchParams()
  for (const [key, value] of fields) {
    body.append(key, value)
  }
  body.set(AJAX_MARKER, '1')
  return body
}

/** POST <form action> with the form fields and the ajax marker. */
export async function submitForm(
  fetchImpl: FetchLike,
  url: string,
  fields: Iterable<[string, string]>,
  signal?: AbortSignal
): Promise<SubmitResponse> {
  const response = await fetchImpl(url, {
    method: 'POST',
    body: buildSubmitBody(fields),
    headers: JSON_HEADERS,
    credentials: 'same-origin',
    signal,
  })
  return readJson(response, submitResponseSchema)
}

/** GET <check_url>. */
export async function getTaskStatus(
  fetchImpl: FetchLike,
  checkUrl: string,
  signal?: AbortSignal
): Promise<TaskStatus> {
  const response = await fetchImpl(checkUrl, {
    method: 'GET',
    headers: JSON_HEADERS,
    credentials: 'same-origin',
    cache: 'no-store',
    signal,
  })
  return readJson(response, taskStatusSchema)
}
