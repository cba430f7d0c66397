export type Milliseconds = number
export type MillisecondsDelay = { milliseconds: Milliseconds }

export type Delay = MillisecondsDelay

/**
 * A base delay plus an upper bound on the random amount added to it.
 *
 * The resulting delay is uniform in `[milliseconds, milliseconds + jitterMs]`.
 */
export type JitteredDelay = Delay & { jitterMs: Milliseconds }

/**
 * Delay before the next attempt; attempt is 0-indexed.
 */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}
