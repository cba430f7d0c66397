import { ConfigValidationError, type ConfigSource, EnvSource, loadConfig } from "@herdguard/config"
import { z } from "zod"
import type { CacheClientOptions, CacheOptions } from "../../ports/cache-options"
import { InvalidOptionsError } from "../errors/invalid-options-error"
import { DEFAULT_CACHE_OPTIONS } from "./defaults"
import { resolveCacheOptions } from "./resolve-options"

const nonNegativeInt = z.coerce.number().int().nonnegative().optional()

export const cacheEnvSchema = z.object({
  STRONG_CONSISTENCY: z.stringbool().optional(),
  LOCK_TTL_MS: nonNegativeInt,
  LOCK_TTL_JITTER_MS: nonNegativeInt,
  LOCK_RETRY_INTERVAL_MS: nonNegativeInt,
  LOCK_RETRY_JITTER_MS: nonNegativeInt,
  MAX_RETRIES: nonNegativeInt,
  EMPTY_TTL_MS: nonNegativeInt,
  TTL_JITTER_RATIO: z.coerce.number().optional(),
  DELETED_RETENTION_MS: nonNegativeInt,
  DISABLE_CACHE_READ: z.stringbool().optional(),
  DISABLE_CACHE_DELETE: z.stringbool().optional(),
})

export type CacheEnv = z.infer<typeof cacheEnvSchema>

export const CACHE_ENV_PREFIX = "HERDGUARD_"

/**
 * Reads cache options from configuration sources, by default the
 * `HERDGUARD_`-prefixed environment variables.
 *
 * A jitter given without its base pairs with the default base.
 *
 * @throws InvalidOptionsError
 */
export async function loadCacheOptions(
  sources: ConfigSource[] = [new EnvSource({ prefix: CACHE_ENV_PREFIX })],
): Promise<Readonly<CacheOptions>> {
  let env: CacheEnv

  try {
    env = (await loadConfig({ schema: cacheEnvSchema, sources })).value
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      throw new InvalidOptionsError(err.message, { sources: err.context.sources }, err)
    }
    throw err
  }

  return resolveCacheOptions(toClientOptions(env))
}

function toClientOptions(env: CacheEnv): CacheClientOptions {
  const d = DEFAULT_CACHE_OPTIONS
  const out: CacheClientOptions = {}

  if (env.STRONG_CONSISTENCY !== undefined) out.strongConsistency = env.STRONG_CONSISTENCY
  if (env.MAX_RETRIES !== undefined) out.maxRetries = env.MAX_RETRIES
  if (env.TTL_JITTER_RATIO !== undefined) out.ttlJitterRatio = env.TTL_JITTER_RATIO
  if (env.DISABLE_CACHE_READ !== undefined) out.disableCacheRead = env.DISABLE_CACHE_READ
  if (env.DISABLE_CACHE_DELETE !== undefined) out.disableCacheDelete = env.DISABLE_CACHE_DELETE

  if (env.EMPTY_TTL_MS !== undefined) out.emptyTtl = { milliseconds: env.EMPTY_TTL_MS }

  if (env.DELETED_RETENTION_MS !== undefined) {
    out.deletedRetention = { milliseconds: env.DELETED_RETENTION_MS }
  }

  if (env.LOCK_TTL_MS !== undefined || env.LOCK_TTL_JITTER_MS !== undefined) {
    out.lockTtl = {
      milliseconds: env.LOCK_TTL_MS ?? d.lockTtl.milliseconds,
      jitterMs: env.LOCK_TTL_JITTER_MS ?? d.lockTtl.jitterMs,
    }
  }

  if (env.LOCK_RETRY_INTERVAL_MS !== undefined || env.LOCK_RETRY_JITTER_MS !== undefined) {
    out.lockRetryInterval = {
      milliseconds: env.LOCK_RETRY_INTERVAL_MS ?? d.lockRetryInterval.milliseconds,
      jitterMs: env.LOCK_RETRY_JITTER_MS ?? d.lockRetryInterval.jitterMs,
    }
  }

  return out
}
