import { setTimeout as delay } from "node:timers/promises"
import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return

    try {
      await delay(ms, undefined, signal ? { signal } : {})
    } catch (err) {
      if (isAbortError(err)) return

      throw err
    }
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError"
}
