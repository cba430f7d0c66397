import {
  createJitteredDelay,
  type DelayPolicy,
  type JitterStrategy,
  type RandomSource,
  ratioJitter,
  systemRandom,
} from "@herdguard/backoff"
import { type Clock, SystemClock } from "@herdguard/clock"
import { toAppError } from "@herdguard/errors"
import {
  LockCoordinator,
  type LockDecision,
  pollUntil,
  type TokenGenerator,
} from "@herdguard/lock"
import { createNullLogger, type Logger } from "@herdguard/logger"
import type { OwnerToken, RecordStore } from "@herdguard/store"
import type { CacheKey } from "../ports/cache-key"
import type {
  CacheClientOptions,
  CacheOptions,
  CacheTtl,
  FetchOptions,
} from "../ports/cache-options"
import type { Codec } from "../ports/codec"
import type { Loader } from "../ports/loader"
import type { ReadThroughCache } from "../ports/read-through-cache"
import { decodeEntry, encodeEntry } from "./codec/entry-envelope"
import { jsonCodec } from "./codec/json-codec"
import { InvalidOptionsError } from "./errors/invalid-options-error"
import { resolveCacheOptions } from "./options/resolve-options"

export type CacheClientDeps = {
  store: RecordStore

  /** @default new SystemClock() */
  clock?: Clock

  /** Drives lock, polling and TTL jitter. @default systemRandom */
  random?: RandomSource

  generateToken?: TokenGenerator
  logger?: Logger
}

type Acquired = Extract<LockDecision, { owner: OwnerToken }>

/**
 * Read-through cache over a shared {@link RecordStore}.
 *
 * @remarks
 * Holds no per-key state in memory; every coordination step is an atomic
 * store operation, so clients in different processes cooperate as long as
 * they share the store. The only local state is the set of background
 * refreshes, exposed through {@link CacheClient.whenIdle}.
 *
 * @example
 * ```ts
 * const cache = createMemoryCacheClient()
 *
 * const user = await cache.fetch("user:42", { milliseconds: 600_000 }, () =>
 *   db.findUser(42),
 * )
 *
 * await db.updateUser(42, patch)
 * await cache.tagAsDeleted("user:42")
 * ```
 */
export class CacheClient implements ReadThroughCache {
  readonly options: Readonly<CacheOptions>

  private readonly clock: Clock
  private readonly coordinator: LockCoordinator
  private readonly retryDelay: DelayPolicy
  private readonly ttlJitter: JitterStrategy
  private readonly logger: Logger
  private readonly background = new Set<Promise<void>>()

  public constructor(deps: CacheClientDeps, options: CacheClientOptions = {}) {
    this.options = resolveCacheOptions(options)

    const random = deps.random ?? systemRandom

    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "cache-client",
      consistency: this.options.strongConsistency ? "strong" : "weak",
    })
    this.retryDelay = createJitteredDelay(this.options.lockRetryInterval, random)
    this.ttlJitter = ratioJitter({ ratio: this.options.ttlJitterRatio }, random)
    this.coordinator = new LockCoordinator(
      {
        store: deps.store,
        clock: this.clock,
        random,
        ...(deps.generateToken && { generateToken: deps.generateToken }),
        logger: this.logger,
      },
      {
        lockTtl: this.options.lockTtl,
        deletedRetention: this.options.deletedRetention,
      },
    )
  }

  async fetch<T>(
    key: CacheKey,
    ttl: CacheTtl,
    loader: Loader<T>,
    opts: FetchOptions<T> = {},
  ): Promise<T | null> {
    assertKey(key)
    this.assertTtl(ttl)

    if (this.options.disableCacheRead) return await loader()

    const codec = opts.codec ?? jsonCodec<T>()
    const waitForFresh = this.options.strongConsistency

    const polled = await pollUntil<LockDecision, Uint8Array | null>(
      async (attempt) => {
        const decision = await this.coordinator.decide(key, ttl)

        if (decision.kind === "locked-by-other" && (waitForFresh || decision.stale === null)) {
          this.logger.trace("waiting on lock", { key, attempt })
          return { done: false, last: decision.stale }
        }

        return { done: true, value: decision }
      },
      { sleeper: this.clock },
      {
        delay: this.retryDelay,
        maxRetries: this.options.maxRetries,
        ...(opts.signal && { signal: opts.signal }),
      },
    )

    if (!polled.ok) {
      this.logger.debug("stopped waiting on lock", {
        key,
        reason: polled.reason,
        stale: polled.last !== null,
      })

      return polled.last === null ? null : decodeEntry(codec, polled.last)
    }

    const decision = polled.value

    switch (decision.kind) {
      case "hit":
        return decodeEntry(codec, decision.value)

      case "locked-by-other":
        return decision.stale === null ? null : decodeEntry(codec, decision.stale)

      case "miss":
        return await this.loadAndStore(key, ttl, decision, loader, codec)

      case "needs-fetch":
        if (!waitForFresh && decision.stale !== null) {
          this.refreshInBackground(key, this.loadAndStore(key, ttl, decision, loader, codec))
          return decodeEntry(codec, decision.stale)
        }

        return await this.loadAndStore(key, ttl, decision, loader, codec)
    }
  }

  async tagAsDeleted(key: CacheKey): Promise<void> {
    assertKey(key)

    if (this.options.disableCacheDelete) return

    await this.coordinator.tagAsDeleted(key)
  }

  async whenIdle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background])
    }
  }

  /** Keeps every epoch and TTL derived from `ttl` a safe integer. */
  private assertTtl(ttl: CacheTtl): void {
    const { lockTtl, deletedRetention } = this.options
    const maxMs =
      Number.MAX_SAFE_INTEGER -
      this.clock.nowMs() -
      lockTtl.milliseconds -
      lockTtl.jitterMs -
      deletedRetention.milliseconds

    const ms = ttl.milliseconds

    if (!Number.isSafeInteger(ms) || ms <= 0 || ms > maxMs) {
      throw new InvalidOptionsError(
        `ttl.milliseconds must be a positive integer no greater than ${maxMs}`,
        { ttl: ms, maxMs },
      )
    }
  }

  /**
   * Runs the loader under `owner`'s lock and writes the outcome. Every exit
   * path either commits or releases.
   */
  private async loadAndStore<T>(
    key: CacheKey,
    ttl: CacheTtl,
    { owner }: Acquired,
    loader: Loader<T>,
    codec: Codec<T>,
  ): Promise<T | null> {
    const startedAt = this.clock.nowMs()
    let value: T | null
    let entry: Uint8Array

    try {
      value = await loader()
      entry = encodeEntry(codec, value)
    } catch (err) {
      await this.releaseQuietly(key, owner)
      throw err
    }

    const durationMs = this.clock.nowMs() - startedAt

    if (value === null && this.options.emptyTtl.milliseconds === 0) {
      const released = await this.coordinator.release(key, owner)
      if (released.kind === "stale") this.logger.debug("lock lost before release", { key, owner })

      return null
    }

    const written = await this.coordinator.commit(
      key,
      owner,
      entry,
      value === null ? this.options.emptyTtl : this.ttlJitter.apply(ttl),
    )

    if (written.kind === "stale") {
      this.logger.debug("discarded write from superseded owner", { key, owner, durationMs })
    } else {
      this.logger.debug("stored loader result", {
        key,
        owner,
        durationMs,
        negative: value === null,
      })
    }

    return value
  }

  private async releaseQuietly(key: CacheKey, owner: OwnerToken): Promise<void> {
    try {
      const released = await this.coordinator.release(key, owner)
      if (released.kind === "stale") this.logger.debug("lock lost before release", { key, owner })
    } catch (err) {
      this.logger.warn("failed to release lock", { key, owner, err: toAppError(err) })
    }
  }

  private refreshInBackground(key: CacheKey, refresh: Promise<unknown>): void {
    const tracked: Promise<void> = refresh
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger.warn("background refresh failed", { key, err: toAppError(err) })
        },
      )
      .finally(() => {
        this.background.delete(tracked)
      })

    this.background.add(tracked)
  }
}

function assertKey(key: CacheKey): void {
  if (typeof key !== "string" || key.length === 0) {
    throw new InvalidOptionsError("Cache key must be a non-empty string", { key })
  }
}

export function createCacheClient(
  deps: CacheClientDeps,
  options?: CacheClientOptions,
): CacheClient {
  return new CacheClient(deps, options)
}
