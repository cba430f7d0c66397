import type { Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Suspend for `ms` milliseconds.
   *
   * Resolves early (never rejects) if `signal` is aborted.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

/**
 * Wall clock plus a way to wait on it.
 *
 * Lock deadlines and polling intervals are both measured against the same
 * clock, so a test can swap in `FakeClock` and drive lock expiry by sleeping.
 */
export type Clock = TimeSource & Sleeper
