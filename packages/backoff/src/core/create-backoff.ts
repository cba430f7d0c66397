import { systemRandom } from "../adapters/random"
import type { Delay, DelayPolicy, JitteredDelay } from "../ports/delay-policy"
import type { JitterStrategy } from "../ports/jitter-strategy"
import type { RandomSource } from "../ports/random-source"
import { additiveJitter } from "./jitter/additive"
import { constant } from "./strategies/constant"

function sanitize(ms: number, fallback: number): number {
  return Number.isFinite(ms) && ms >= 0 ? ms : fallback
}

function clamp(ms: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, ms))
}

function assertDelay(ms: number, name: string): void {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`${name} must be finite and >= 0 (got ${ms})`)
  }
}

export type CreateBackoffOptions = {
  delay: DelayPolicy
  jitter?: JitterStrategy

  /** Floor for delay. Must be finite, non-negative. Default: 0 */
  min?: Delay

  /** Ceiling for delay. Must be finite, non-negative, >= min. */
  max: Delay
}

export type CreateBackoffFn = (options: CreateBackoffOptions) => DelayPolicy

/**
 * Creates a DelayPolicy with clamping and sanitization.
 * Guarantees finite, non-negative, clamped, integer output.
 */
export const createBackoff: CreateBackoffFn = (
  options: CreateBackoffOptions,
): DelayPolicy => {
  const { delay, jitter } = options
  const minMs = options.min?.milliseconds ?? 0
  const maxMs = options.max.milliseconds

  assertDelay(minMs, "min.milliseconds")
  assertDelay(maxMs, "max.milliseconds")

  if (maxMs < minMs) {
    throw new RangeError(
      `max.milliseconds must be >= min.milliseconds (got ${maxMs} < ${minMs})`,
    )
  }

  return {
    getDelay(attempt: number): Delay {
      const raw = delay.getDelay(attempt)
      const jittered = jitter ? jitter.apply(raw) : raw
      const sanitized = sanitize(jittered.milliseconds, minMs)
      const clamped = clamp(sanitized, minMs, maxMs)

      return { milliseconds: Math.floor(clamped) }
    },
  }
}

/**
 * Policy for a fixed base plus uniform jitter, bounded to
 * `[base, base + jitterMs]` on every attempt.
 */
export function createJitteredDelay(
  jittered: JitteredDelay,
  random: RandomSource = systemRandom,
): DelayPolicy {
  assertDelay(jittered.milliseconds, "milliseconds")
  assertDelay(jittered.jitterMs, "jitterMs")

  return createBackoff({
    delay: constant({ delay: { milliseconds: jittered.milliseconds } }),
    jitter: additiveJitter({ range: { milliseconds: jittered.jitterMs } }, random),
    min: { milliseconds: jittered.milliseconds },
    max: { milliseconds: jittered.milliseconds + jittered.jitterMs },
  })
}
