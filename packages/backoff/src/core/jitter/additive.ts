import { systemRandom } from "../../adapters/random"
import type { Delay } from "../../ports/delay-policy"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"

export interface AdditiveJitterOptions {
  /** Largest amount added on top of the delay. */
  range: Delay
}

/**
 * Additive jitter: the delay plus a random value up to `range`.
 * Never shortens the delay, so a lock lifetime stays at least its base.
 *
 * Range (integer ms): [base, base + range]
 */
export function additiveJitter(
  options: AdditiveJitterOptions,
  random: RandomSource = systemRandom,
): JitterStrategy {
  const rangeMs = options.range.milliseconds

  return {
    apply(delay: Delay): Delay {
      return {
        milliseconds: delay.milliseconds + Math.floor(random.next() * (rangeMs + 1)),
      }
    },
  }
}
