import type { OwnerToken } from "@herdguard/store"

/**
 * What a caller should do about a key, derived from one atomic
 * read-and-maybe-lock of its record.
 *
 * `stale` is the previous value (an encoded entry) when the record has one.
 */
export type LockDecision =
  /** Fresh value, nothing to do. */
  | { kind: "hit"; value: Uint8Array }
  /** No record existed; this caller now holds the lock. */
  | { kind: "miss"; owner: OwnerToken }
  /** The record was stale or its lock abandoned; this caller now holds the lock. */
  | { kind: "needs-fetch"; owner: OwnerToken; stale: Uint8Array | null }
  /** Someone else is computing the value. */
  | { kind: "locked-by-other"; stale: Uint8Array | null }

export type LockDecisionKind = LockDecision["kind"]
