import type { Milliseconds } from "@herdguard/clock"
import type { CacheRecord, OwnerToken, RecordKey, RecordTtl } from "./cache-record"

export type ReadAndLockInput = {
  now: Milliseconds
  owner: OwnerToken
  lockUntil: Milliseconds
  physicalTtl: RecordTtl
}

export type ReadAndLockResult = {
  /** The record as it was before this call touched it. */
  record: CacheRecord | null
  acquired: boolean
}

export type WriteResultInput = {
  owner: OwnerToken
  value: Uint8Array
  lockUntil: Milliseconds
  physicalTtl: RecordTtl
}

export type ReleaseInput = {
  owner: OwnerToken
  now: Milliseconds
  physicalTtl: RecordTtl
}

export type TagInput = {
  now: Milliseconds
  physicalTtl: RecordTtl
}

export type FencedWriteResult = { kind: "written" } | { kind: "stale" }

export type TagSkipReason = "not_found" | "already_stale"

export type TagResult =
  | { kind: "tagged" }
  | { kind: "tagged_while_locked" }
  | { kind: "skipped"; reason: TagSkipReason }

/**
 * Shared store holding one {@link CacheRecord} per key.
 *
 * @remarks
 * Every method is a single atomic step per key: no other operation on the
 * same key can interleave with it. Transport failures reject with
 * `StoreUnavailableError`.
 */
export interface RecordStore {
  /**
   * Reads the record and, if it is absent or `lockUntil <= now`, locks it for
   * `owner` until `lockUntil`, drops any pending tag and raises its physical
   * TTL to at least `physicalTtl`. A live lock or a fresh value is left
   * untouched.
   */
  readAndLock(key: RecordKey, input: ReadAndLockInput): Promise<ReadAndLockResult>

  /**
   * Stores `value` valid until `lockUntil` and clears the owner, but only if
   * `owner` still holds the lock. Otherwise nothing changes. If the record was
   * tagged while locked, the value is valid only until the tag time.
   */
  writeResult(key: RecordKey, input: WriteResultInput): Promise<FencedWriteResult>

  /**
   * Gives up the lock held by `owner`: `lockUntil = now`, owner cleared, value
   * kept. A record without a value gets `physicalTtl` so it does not linger.
   */
  release(key: RecordKey, input: ReleaseInput): Promise<FencedWriteResult>

  /**
   * Marks a valid record as logically deleted and lets it live `physicalTtl`
   * longer. Never creates a record.
   *
   * A live lock keeps its owner; the tag time is remembered instead and caps
   * the validity of that owner's write (`tagged_while_locked`). A new
   * acquisition or a release forgets it.
   */
  tagAsDeleted(key: RecordKey, input: TagInput): Promise<TagResult>
}
