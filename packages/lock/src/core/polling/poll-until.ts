import type { DelayPolicy } from "@herdguard/backoff"
import type { Sleeper } from "@herdguard/clock"

export type PollStep<T, L> = { done: true; value: T } | { done: false; last: L }

export type PollUntilSuccess<T> = { ok: true; value: T }
export type PollUntilExhaustedFailure<L> = { ok: false; reason: "exhausted"; last: L }
export type PollUntilAbortFailure<L> = { ok: false; reason: "aborted"; last: L }
export type PollUntilFailure<L> = PollUntilExhaustedFailure<L> | PollUntilAbortFailure<L>
export type PollUntilResult<T, L> = PollUntilSuccess<T> | PollUntilFailure<L>

export type PollOptions = {
  /** Sleep before retry `n` (0-indexed). */
  delay: DelayPolicy

  /** Attempts after the first one. */
  maxRetries: number

  /** Cuts the waiting short. The first attempt always runs. */
  signal?: AbortSignal
}

export type PollDeps = {
  sleeper: Sleeper
}

/**
 * Runs `attempt` until it reports done, sleeping between tries. Gives up after
 * `1 + maxRetries` attempts, handing back what the last one saw.
 */
export async function pollUntil<T, L>(
  attempt: (n: number) => Promise<PollStep<T, L>>,
  deps: PollDeps,
  opts: PollOptions,
): Promise<PollUntilResult<T, L>> {
  if (!Number.isSafeInteger(opts.maxRetries) || opts.maxRetries < 0) {
    throw new RangeError(`Invalid maxRetries: ${opts.maxRetries}`)
  }

  for (let n = 0; ; n++) {
    const step = await attempt(n)

    if (step.done) return { ok: true, value: step.value }
    if (n >= opts.maxRetries) return { ok: false, reason: "exhausted", last: step.last }
    if (opts.signal?.aborted) return { ok: false, reason: "aborted", last: step.last }

    await deps.sleeper.sleep(opts.delay.getDelay(n).milliseconds, opts.signal)

    if (opts.signal?.aborted) return { ok: false, reason: "aborted", last: step.last }
  }
}

export type PollUntilFn = typeof pollUntil
