/** Status lines shown in the waiting dialog while a task runs. */
export const MESSAGES = {
  processing: 'We are processing your request …',
  queued: 'Your request has been queued on the server and will soon be processed.',
  started: 'Your request is currently being processed. Depending on its size, this might take up to a few minutes.',
  degraded:
    'Your request arrived on the server but we still wait for it to be processed. If this takes longer than two minutes, please reload this page and try again.',
} as const
