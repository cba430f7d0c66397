import { z } from "zod"
import type { CacheClientOptions, CacheOptions } from "../../ports/cache-options"
import { InvalidOptionsError } from "../errors/invalid-options-error"
import { DEFAULT_CACHE_OPTIONS } from "./defaults"

const nonNegativeMs = z.number().int().nonnegative()

const jitteredDelay = z.object({ milliseconds: nonNegativeMs, jitterMs: nonNegativeMs })

export const cacheOptionsSchema = z.object({
  strongConsistency: z.boolean(),
  lockTtl: z.object({ milliseconds: z.number().int().positive(), jitterMs: nonNegativeMs }),
  lockRetryInterval: jitteredDelay,
  maxRetries: z.number().int().nonnegative(),
  emptyTtl: z.object({ milliseconds: nonNegativeMs }),
  ttlJitterRatio: z.number().min(0).lt(1),
  deletedRetention: z.object({ milliseconds: z.number().int().positive() }),
  disableCacheRead: z.boolean(),
  disableCacheDelete: z.boolean(),
})

/**
 * Fills gaps from {@link DEFAULT_CACHE_OPTIONS}, validates, and freezes.
 *
 * @throws InvalidOptionsError
 */
export function resolveCacheOptions(options: CacheClientOptions = {}): Readonly<CacheOptions> {
  const d = DEFAULT_CACHE_OPTIONS

  const merged: CacheOptions = {
    strongConsistency: options.strongConsistency ?? d.strongConsistency,
    lockTtl: options.lockTtl ?? d.lockTtl,
    lockRetryInterval: options.lockRetryInterval ?? d.lockRetryInterval,
    maxRetries: options.maxRetries ?? d.maxRetries,
    emptyTtl: options.emptyTtl ?? d.emptyTtl,
    ttlJitterRatio: options.ttlJitterRatio ?? d.ttlJitterRatio,
    deletedRetention: options.deletedRetention ?? d.deletedRetention,
    disableCacheRead: options.disableCacheRead ?? d.disableCacheRead,
    disableCacheDelete: options.disableCacheDelete ?? d.disableCacheDelete,
  }

  const result = cacheOptionsSchema.safeParse(merged)

  if (!result.success) {
    throw new InvalidOptionsError(`Invalid cache options:\n${z.prettifyError(result.error)}`, {
      issues: result.error.issues.map((issue) => issue.path.join(".")),
    })
  }

  const o = result.data

  return Object.freeze({
    ...o,
    lockTtl: Object.freeze(o.lockTtl),
    lockRetryInterval: Object.freeze(o.lockRetryInterval),
    emptyTtl: Object.freeze(o.emptyTtl),
    deletedRetention: Object.freeze(o.deletedRetention),
  })
}
