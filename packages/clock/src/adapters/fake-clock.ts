import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export class FakeClock implements Clock {
  private time: Milliseconds
  private readonly slept: Milliseconds[] = []

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  /**
   * Moves time forward by `ms` instead of waiting, then yields once so other
   * pending work can observe the new time.
   */
  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.slept.push(ms)
    this.advance(Math.max(0, ms))

    await Promise.resolve()
  }

  /** Durations passed to `sleep()` so far, in call order. */
  sleeps(): readonly Milliseconds[] {
    return [...this.slept]
  }
}
