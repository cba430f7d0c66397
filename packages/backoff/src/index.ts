export { fixedRandom, sequenceRandom, systemRandom } from "./adapters/random"
export {
  type CreateBackoffFn,
  type CreateBackoffOptions,
  createBackoff,
  createJitteredDelay,
} from "./core/create-backoff"
export { type AdditiveJitterOptions, additiveJitter } from "./core/jitter/additive"
export { type RatioJitterOptions, ratioJitter } from "./core/jitter/ratio"
export { constant } from "./core/strategies/constant"
export type {
  Delay,
  DelayPolicy,
  JitteredDelay,
  Milliseconds,
} from "./ports/delay-policy"
export type { JitterStrategy } from "./ports/jitter-strategy"
export type { RandomSource } from "./ports/random-source"
