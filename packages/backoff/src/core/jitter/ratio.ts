import { systemRandom } from "../../adapters/random"
import type { Delay } from "../../ports/delay-policy"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"

export interface RatioJitterOptions {
  /** Largest fraction of the delay that may be removed. In [0, 1). */
  ratio: number
}

/**
 * Ratio jitter: shortens the delay by a random fraction up to `ratio`.
 *
 * Used on cache TTLs so entries written together do not all expire together.
 * With a 600s TTL and ratio 0.1 the result lies in [540s, 600s].
 */
export function ratioJitter(
  options: RatioJitterOptions,
  random: RandomSource = systemRandom,
): JitterStrategy {
  const { ratio } = options

  if (!Number.isFinite(ratio) || ratio < 0 || ratio >= 1) {
    throw new RangeError(`ratio must be in [0, 1) (got ${ratio})`)
  }

  return {
    apply(delay: Delay): Delay {
      const cut = Math.floor(random.next() * ratio * delay.milliseconds)

      return { milliseconds: delay.milliseconds - cut }
    },
  }
}
