import type { Delay } from "./delay-policy"

/**
 * Adds randomness so competing callers do not retry or expire in lockstep.
 * Implementations should return non-negative numbers but are not trusted;
 * `createBackoff` sanitizes and clamps whatever comes back.
 */
export interface JitterStrategy {
  apply(delay: Delay): Delay
}
