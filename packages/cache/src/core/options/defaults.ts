import type { CacheOptions } from "../../ports/cache-options"

export const DEFAULT_CACHE_OPTIONS: CacheOptions = Object.freeze({
  strongConsistency: false,
  lockTtl: Object.freeze({ milliseconds: 3_000, jitterMs: 300 }),
  lockRetryInterval: Object.freeze({ milliseconds: 100, jitterMs: 50 }),
  maxRetries: 50,
  emptyTtl: Object.freeze({ milliseconds: 60_000 }),
  ttlJitterRatio: 0.1,
  deletedRetention: Object.freeze({ milliseconds: 10_000 }),
  disableCacheRead: false,
  disableCacheDelete: false,
})
