import { type Clock, SystemClock } from "@herdguard/clock"
import {
  type KeyspacePrefix,
  MemoryRecordStore,
  type RedisScriptClient,
  RedisRecordStore,
} from "@herdguard/store"
import type { CacheClientOptions } from "../ports/cache-options"
import { CacheClient, type CacheClientDeps } from "./cache-client"

export type MemoryCacheClientDeps = Omit<CacheClientDeps, "store">

/**
 * Cache backed by an in-process store. Coordinates only callers in this
 * process; meant for tests and single-instance deployments.
 */
export function createMemoryCacheClient(
  options?: CacheClientOptions,
  deps: MemoryCacheClientDeps = {},
): CacheClient {
  const clock: Clock = deps.clock ?? new SystemClock()

  return new CacheClient({ ...deps, clock, store: new MemoryRecordStore({ clock }) }, options)
}

export type RedisCacheClientDeps = Omit<CacheClientDeps, "store"> & {
  client: RedisScriptClient
  keyspacePrefix: KeyspacePrefix
}

/** Cache shared by every process pointing `client` at the same Redis. */
export function createRedisCacheClient(
  { client, keyspacePrefix, ...deps }: RedisCacheClientDeps,
  options?: CacheClientOptions,
): CacheClient {
  const store = new RedisRecordStore(
    { client, ...(deps.logger && { logger: deps.logger }) },
    { keyspacePrefix },
  )

  return new CacheClient({ ...deps, store }, options)
}
