import type { CacheKey } from "./cache-key"
import type { CacheTtl, FetchOptions } from "./cache-options"
import type { Loader } from "./loader"

/**
 * Read-through cache that lets one caller at a time recompute a key.
 */
export interface ReadThroughCache {
  /**
   * Returns the cached value for `key`, calling `loader` on a miss.
   *
   * @remarks
   * - Concurrent callers for the same key, in any process, share one loader call.
   * - A `null` from the loader is cached for `emptyTtl` and returned as `null`.
   * - A loader rejection is rethrown unchanged; nothing is cached.
   * - Under weak consistency a stale value may be returned while a refresh runs
   *   in the background.
   */
  fetch<T>(
    key: CacheKey,
    ttl: CacheTtl,
    loader: Loader<T>,
    opts?: FetchOptions<T>,
  ): Promise<T | null>

  /**
   * Marks the value for `key` stale without deleting it. The next `fetch`
   * triggers exactly one recompute. Safe to call repeatedly. A recompute
   * already in flight is stored stale, so it cannot outlive the tag.
   */
  tagAsDeleted(key: CacheKey): Promise<void>

  /** Resolves once every background refresh started so far has settled. */
  whenIdle(): Promise<void>
}
