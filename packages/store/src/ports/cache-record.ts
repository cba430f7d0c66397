import type { Milliseconds } from "@herdguard/clock"

export type RecordKey = string

/** Fencing token, unique per lock acquisition. */
export type OwnerToken = string

/**
 * The per-key record kept in the shared store.
 *
 * State is read off `lockUntil` and `lockOwner` against the caller's clock:
 * - `lockUntil > now`, owner set: locked, a computation is in flight
 * - `lockUntil > now`, no owner: valid, `value` is fresh
 * - `lockUntil <= now`: logically deleted; `value` may still be served as stale
 *
 * Physical expiry is store-level garbage collection only and never decides
 * validity.
 */
export type CacheRecord = {
  /** Opaque bytes, `null` when nothing has been computed yet. */
  value: Uint8Array | null

  /** Epoch milliseconds. A record without the field reads as 0. */
  lockUntil: Milliseconds

  lockOwner: OwnerToken | null
}

export type RecordTtl = { milliseconds: Milliseconds }
