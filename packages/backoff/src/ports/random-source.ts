/**
 * Source of randomness for jitter.
 *
 * @remarks
 * `next()` MUST return a floating-point number in the range [0, 1).
 * Inject a pinned source in tests to make lock lifetimes and retry intervals
 * deterministic.
 */
export interface RandomSource {
  next(): number
}
