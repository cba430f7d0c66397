export {
  CacheClient,
  type CacheClientDeps,
  createCacheClient,
} from "./core/cache-client"
export { decodeEntry, encodeEntry, NEGATIVE_TAG, VALUE_TAG } from "./core/codec/entry-envelope"
export { jsonCodec } from "./core/codec/json-codec"
export { superjsonCodec } from "./core/codec/superjson-codec"
export {
  createMemoryCacheClient,
  createRedisCacheClient,
  type MemoryCacheClientDeps,
  type RedisCacheClientDeps,
} from "./core/create"
export { CacheCodecError } from "./core/errors/cache-codec-error"
export { InvalidOptionsError } from "./core/errors/invalid-options-error"
export { DEFAULT_CACHE_OPTIONS } from "./core/options/defaults"
export {
  CACHE_ENV_PREFIX,
  type CacheEnv,
  cacheEnvSchema,
  loadCacheOptions,
} from "./core/options/load-options"
export { cacheOptionsSchema, resolveCacheOptions } from "./core/options/resolve-options"
export type { CacheKey } from "./ports/cache-key"
export type {
  CacheClientOptions,
  CacheOptions,
  CacheTtl,
  FetchOptions,
} from "./ports/cache-options"
export type { Codec } from "./ports/codec"
export type { Loader } from "./ports/loader"
export type { ReadThroughCache } from "./ports/read-through-cache"
