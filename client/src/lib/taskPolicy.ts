/**
 * Timing and retry knobs for the submit → poll loop.
 *
 * Two deployments of the loop exist and they do not agree:
 *   - back office forms: first poll after 250 ms, then every 500 ms
 *   - embedded shop widget: first poll after 100 ms, then every 250 ms
 * Both back off to a longer delay while the server answers 5xx during polling.
 * Neither is "the" correct one, so both are presets and callers pick.
 */
export interface AsyncTaskPolicy {
  /** Delay between the submission answer and the first status check. */
  initialDelayMs: number
  /** Delay between two status checks while the task is still running. */
  pollDelayMs: number
  /** Delay after a 5xx or network failure before the next attempt. */
  serverErrorDelayMs: number
  /** What a 5xx answer to the initial POST means. */
  submitServerError: 'fail' | 'retry'
}

export const BACKOFFICE_POLICY: AsyncTaskPolicy = {
  initialDelayMs: 250,
  pollDelayMs: 500,
  serverErrorDelayMs: 5000,
  submitServerError: 'fail',
}

export const WIDGET_POLICY: AsyncTaskPolicy = {
  initialDelayMs: 100,
  pollDelayMs: 250,
  serverErrorDelayMs: 1000,
  submitServerError: 'fail',
}

export const POLICY_PRESETS = {
  backoffice: BACKOFFICE_POLICY,
  widget: WIDGET_POLICY,
} as const

export type PolicyPresetName = keyof typeof POLICY_PRESETS

function isPresetName(name: string): name is PolicyPresetName {
  return Object.prototype.hasOwnProperty.call(POLICY_PRESETS, name)
}

/** Preset by name (data-asynctask-policy); unknown or missing names fall back to the back office preset. */
export function getPolicyPreset(name: string | null | undefined): AsyncTaskPolicy {
  if (name && isPresetName(name)) return POLICY_PRESETS[name]
  return BACKOFFICE_POLICY
}
