import type { Milliseconds, TimeSource } from "@herdguard/clock"
import { assertEpochMs, assertOwner, assertPhysicalTtl } from "../../core/validation"
import type { CacheRecord, OwnerToken, RecordKey, RecordTtl } from "../../ports/cache-record"
import type {
  FencedWriteResult,
  ReadAndLockInput,
  ReadAndLockResult,
  RecordStore,
  ReleaseInput,
  TagInput,
  TagResult,
  WriteResultInput,
} from "../../ports/record-store"

type MemoryRecordEntry = {
  value: Uint8Array | null
  lockUntil: Milliseconds
  lockOwner: OwnerToken | null
  /** Set when a tag arrives during a live lock. */
  taggedAt: Milliseconds | null
  expiresAtMs: Milliseconds
}

export type MemoryRecordStoreDeps = {
  /** Drives physical expiry only; logical state uses the `now` passed in. */
  clock: TimeSource
}

/**
 * In-process RecordStore.
 *
 * @remarks
 * Each operation runs to completion inside one synchronous section, which is
 * what makes it atomic. Several cache clients sharing one instance behave like
 * independent processes sharing a Redis.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly records = new Map<RecordKey, MemoryRecordEntry>()

  public constructor(private readonly deps: MemoryRecordStoreDeps) {}

  async readAndLock(key: RecordKey, input: ReadAndLockInput): Promise<ReadAndLockResult> {
    assertEpochMs(input.now, "now")
    assertEpochMs(input.lockUntil, "lockUntil")
    assertOwner(input.owner)
    assertPhysicalTtl(input.physicalTtl)

    const entry = this.live(key)
    const record = entry ? this.snapshotOf(entry) : null

    if (entry && entry.lockUntil > input.now) {
      return { record, acquired: false }
    }

    this.records.set(key, {
      value: entry?.value ?? null,
      lockUntil: input.lockUntil,
      lockOwner: input.owner,
      taggedAt: null,
      expiresAtMs: Math.max(entry?.expiresAtMs ?? 0, this.expiresAt(input.physicalTtl)),
    })

    return { record, acquired: true }
  }

  async writeResult(key: RecordKey, input: WriteResultInput): Promise<FencedWriteResult> {
    assertEpochMs(input.lockUntil, "lockUntil")
    assertPhysicalTtl(input.physicalTtl)

    const entry = this.live(key)

    if (!entry || entry.lockOwner !== input.owner) return { kind: "stale" }

    this.records.set(key, {
      value: new Uint8Array(input.value),
      lockUntil:
        entry.taggedAt === null ? input.lockUntil : Math.min(input.lockUntil, entry.taggedAt),
      lockOwner: null,
      taggedAt: null,
      expiresAtMs: this.expiresAt(input.physicalTtl),
    })

    return { kind: "written" }
  }

  async release(key: RecordKey, input: ReleaseInput): Promise<FencedWriteResult> {
    assertEpochMs(input.now, "now")
    assertPhysicalTtl(input.physicalTtl)

    const entry = this.live(key)

    if (!entry || entry.lockOwner !== input.owner) return { kind: "stale" }

    entry.lockUntil = input.now
    entry.lockOwner = null
    entry.taggedAt = null

    if (entry.value === null) {
      entry.expiresAtMs = this.expiresAt(input.physicalTtl)
    }

    return { kind: "written" }
  }

  async tagAsDeleted(key: RecordKey, input: TagInput): Promise<TagResult> {
    assertEpochMs(input.now, "now")
    assertPhysicalTtl(input.physicalTtl)

    const entry = this.live(key)

    if (!entry) return { kind: "skipped", reason: "not_found" }
    if (entry.lockUntil <= input.now) return { kind: "skipped", reason: "already_stale" }

    if (entry.lockOwner !== null) {
      if (entry.taggedAt === null) entry.taggedAt = input.now
      return { kind: "tagged_while_locked" }
    }

    entry.lockUntil = input.now
    entry.expiresAtMs = this.expiresAt(input.physicalTtl)

    return { kind: "tagged" }
  }

  /** Current record, or `null` if absent or physically expired. */
  peek(key: RecordKey): CacheRecord | null {
    const entry = this.live(key)

    return entry ? this.snapshotOf(entry) : null
  }

  /** Physical expiry of the record in epoch ms, or `null` if absent. */
  expiresAtMs(key: RecordKey): Milliseconds | null {
    return this.live(key)?.expiresAtMs ?? null
  }

  get size(): number {
    this.purgeExpired()

    return this.records.size
  }

  private live(key: RecordKey): MemoryRecordEntry | undefined {
    const entry = this.records.get(key)

    if (entry && this.isExpired(entry)) {
      this.records.delete(key)
      return undefined
    }

    return entry
  }

  private purgeExpired(): void {
    for (const [key, entry] of this.records) {
      if (this.isExpired(entry)) this.records.delete(key)
    }
  }

  private isExpired(entry: MemoryRecordEntry): boolean {
    return this.deps.clock.nowMs() >= entry.expiresAtMs
  }

  private expiresAt(ttl: RecordTtl): Milliseconds {
    return this.deps.clock.nowMs() + ttl.milliseconds
  }

  private snapshotOf(entry: MemoryRecordEntry): CacheRecord {
    return {
      value: entry.value === null ? null : new Uint8Array(entry.value),
      lockUntil: entry.lockUntil,
      lockOwner: entry.lockOwner,
    }
  }
}

export function createMemoryRecordStore(deps: MemoryRecordStoreDeps): MemoryRecordStore {
  return new MemoryRecordStore(deps)
}
