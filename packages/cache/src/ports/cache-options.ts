import type { JitteredDelay } from "@herdguard/backoff"
import type { Milliseconds } from "@herdguard/clock"
import type { Codec } from "./codec"

export type CacheTtl = { milliseconds: Milliseconds }

export type CacheOptions = {
  /**
   * Wait for a fresh value instead of serving a stale one.
   *
   * @default false
   */
  strongConsistency: boolean

  /**
   * How long a lock lives before it counts as abandoned. Should exceed the
   * slowest loader.
   *
   * @default { milliseconds: 3000, jitterMs: 300 }
   */
  lockTtl: JitteredDelay

  /** @default { milliseconds: 100, jitterMs: 50 } */
  lockRetryInterval: JitteredDelay

  /**
   * Polls after the first lock decision before giving up and returning what
   * was last seen.
   *
   * @default 50
   */
  maxRetries: number

  /**
   * TTL for a loader's `null`. `0` disables negative caching.
   *
   * @default { milliseconds: 60000 }
   */
  emptyTtl: CacheTtl

  /**
   * Each TTL is shortened by up to this fraction so keys written together do
   * not expire together. In [0, 1).
   *
   * @default 0.1
   */
  ttlJitterRatio: number

  /**
   * How long a tagged record physically survives to serve stale reads.
   *
   * @default { milliseconds: 10000 }
   */
  deletedRetention: CacheTtl

  /**
   * Bypass the cache and call the loader directly. Degrade switch for when
   * the store is down.
   *
   * @default false
   */
  disableCacheRead: boolean

  /**
   * Make `tagAsDeleted` a no-op. Degrade switch for when the store is down.
   *
   * @default false
   */
  disableCacheDelete: boolean
}

export type CacheClientOptions = Partial<CacheOptions>

export type FetchOptions<T> = {
  /** @default jsonCodec() */
  codec?: Codec<T>

  /** Stops waiting on another caller's lock; the last value seen is returned. */
  signal?: AbortSignal
}
