/**
 * Cache key. Scoped by the record store's keyspace prefix, so it only needs to
 * be unique within one cache.
 */
export type CacheKey = string
