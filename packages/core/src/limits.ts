/**
 * Match limits configuration.
 *
 * Matching is linear in the input, but a host exposed to adversarial input
 * can cap both the input size and the simulation work per call.
 */

import type { MatchLimits } from './types'
import { MatchLimitError } from './types'

/**
 * Default match limits: unbounded, so matching never throws.
 */
const DEFAULT_LIMITS: Required<MatchLimits> = {
  maxInputLength: Number.POSITIVE_INFINITY,
  maxSteps: Number.POSITIVE_INFINITY,
}

/**
 * Resolve match limits by merging user-provided limits with defaults.
 *
 * @public
 */
export function resolveLimits(userLimits?: MatchLimits): Required<MatchLimits> {
  if (!userLimits) {
    return { ...DEFAULT_LIMITS }
  }
  return {
    maxInputLength: userLimits.maxInputLength ?? DEFAULT_LIMITS.maxInputLength,
    maxSteps: userLimits.maxSteps ?? DEFAULT_LIMITS.maxSteps,
  }
}

/**
 * Work counter shared by every step of one match call.
 */
export interface StepCounter {
  steps: number
  readonly maxSteps: number
}

/**
 * Check the input length and start a step counter for one match call.
 *
 * @throws MatchLimitError if the input is longer than `maxInputLength`
 */
export function beginMatch(input: string, limits: Required<MatchLimits>): StepCounter {
  if (input.length > limits.maxInputLength) {
    throw new MatchLimitError(
      'INPUT_LIMIT',
      `Input length ${input.length} exceeds limit of ${limits.maxInputLength}`,
      limits.maxInputLength,
      input.length,
    )
  }
  return { steps: 0, maxSteps: limits.maxSteps }
}

/**
 * Record one transition evaluation.
 *
 * @throws MatchLimitError if the call has exceeded `maxSteps`
 */
export function countStep(counter: StepCounter): void {
  counter.steps++
  if (counter.steps > counter.maxSteps) {
    throw new MatchLimitError(
      'STEP_LIMIT',
      `Match exceeded limit of ${counter.maxSteps} steps`,
      counter.maxSteps,
      counter.steps,
    )
  }
}
