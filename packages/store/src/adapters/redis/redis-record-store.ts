import { createNullLogger, type Logger } from "@herdguard/logger"
import {
  type StoreOperation,
  StoreUnavailableError,
} from "../../core/store-unavailable-error"
import { assertEpochMs, assertOwner, assertPhysicalTtl } from "../../core/validation"
import type { CacheRecord, RecordKey } from "../../ports/cache-record"
import type {
  FencedWriteResult,
  ReadAndLockInput,
  ReadAndLockResult,
  RecordStore,
  ReleaseInput,
  TagInput,
  TagResult,
  TagSkipReason,
  WriteResultInput,
} from "../../ports/record-store"
import type { LuaScript } from "./lua-script"
import { replyBytes, replyInteger, replyText, replyTuple } from "./reply"
import type { RedisScriptArg, RedisScriptClient } from "./redis-client"
import { READ_AND_LOCK, RELEASE, TAG_AS_DELETED, WRITE_RESULT } from "./record-scripts"

/**
 * A prefix that scopes this store to a partition of a shared Redis keyspace,
 * e.g. `catalog:prod:cache:`. Treated as opaque and prepended to every key.
 */
export type KeyspacePrefix = string

export type RedisRecordStoreDeps = {
  client: RedisScriptClient
  logger?: Logger
}

export type RedisRecordStoreOptions = {
  keyspacePrefix: KeyspacePrefix
}

const TAG_SKIP_REASONS: readonly TagSkipReason[] = ["not_found", "already_stale"]

function isTagSkipReason(value: string): value is TagSkipReason {
  return TAG_SKIP_REASONS.some((reason) => reason === value)
}

/**
 * RecordStore on Redis: one hash per key, every operation one Lua script.
 *
 * @remarks
 * - Caller owns `client.connect()` / `client.close()`.
 * - Any client or script failure, and any reply in an unexpected shape,
 *   rejects with `StoreUnavailableError` carrying the original as `cause`.
 */
export class RedisRecordStore implements RecordStore {
  private readonly prefix: string
  private readonly logger: Logger

  public constructor(
    private readonly deps: RedisRecordStoreDeps,
    opts: RedisRecordStoreOptions,
  ) {
    this.prefix = this.normalizePrefix(opts.keyspacePrefix)
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "redis-record-store" })
  }

  async readAndLock(key: RecordKey, input: ReadAndLockInput): Promise<ReadAndLockResult> {
    assertEpochMs(input.now, "now")
    assertEpochMs(input.lockUntil, "lockUntil")
    assertOwner(input.owner)
    assertPhysicalTtl(input.physicalTtl)

    const reply = await this.run("readAndLock", READ_AND_LOCK, key, [
      String(input.now),
      String(input.lockUntil),
      input.owner,
      String(input.physicalTtl.milliseconds),
    ])

    const tuple = replyTuple(reply, 5)
    const exists = replyInteger(tuple?.[0])
    const acquired = replyInteger(tuple?.[4])

    if (!tuple || exists === undefined || acquired === undefined) {
      throw this.malformed("readAndLock", key, reply)
    }

    return {
      record: exists === 0 ? null : this.toRecord(key, tuple),
      acquired: acquired === 1,
    }
  }

  async writeResult(key: RecordKey, input: WriteResultInput): Promise<FencedWriteResult> {
    assertEpochMs(input.lockUntil, "lockUntil")
    assertPhysicalTtl(input.physicalTtl)

    const reply = await this.run("writeResult", WRITE_RESULT, key, [
      input.owner,
      this.toBuffer(input.value),
      String(input.lockUntil),
      String(input.physicalTtl.milliseconds),
    ])

    return this.toFencedResult("writeResult", key, reply)
  }

  async release(key: RecordKey, input: ReleaseInput): Promise<FencedWriteResult> {
    assertEpochMs(input.now, "now")
    assertPhysicalTtl(input.physicalTtl)

    const reply = await this.run("release", RELEASE, key, [
      input.owner,
      String(input.now),
      String(input.physicalTtl.milliseconds),
    ])

    return this.toFencedResult("release", key, reply)
  }

  async tagAsDeleted(key: RecordKey, input: TagInput): Promise<TagResult> {
    assertEpochMs(input.now, "now")
    assertPhysicalTtl(input.physicalTtl)

    const reply = await this.run("tagAsDeleted", TAG_AS_DELETED, key, [
      String(input.now),
      String(input.physicalTtl.milliseconds),
    ])

    const status = replyText(reply)

    if (status === "tagged") return { kind: "tagged" }
    if (status === "tagged_while_locked") return { kind: "tagged_while_locked" }
    if (status && isTagSkipReason(status)) return { kind: "skipped", reason: status }

    throw this.malformed("tagAsDeleted", key, reply)
  }

  private async run(
    operation: StoreOperation,
    script: LuaScript,
    key: RecordKey,
    args: RedisScriptArg[],
  ): Promise<unknown> {
    try {
      return await script.run(this.deps.client, [this.formatKey(key)], args, () => {
        this.logger.debug("script not cached, sending source", { key, operation })
      })
    } catch (err) {
      throw new StoreUnavailableError(
        `Redis ${operation} failed for key "${key}"`,
        { operation, key },
        err,
      )
    }
  }

  private toRecord(key: RecordKey, tuple: unknown[]): CacheRecord {
    const value = replyBytes(tuple[1])
    const lockUntil = tuple[2] === null ? 0 : replyInteger(tuple[2])
    const lockOwner = replyText(tuple[3])

    if (value === undefined || lockUntil === undefined || lockOwner === undefined) {
      throw this.malformed("readAndLock", key, tuple)
    }

    return { value, lockUntil, lockOwner }
  }

  private toFencedResult(
    operation: StoreOperation,
    key: RecordKey,
    reply: unknown,
  ): FencedWriteResult {
    const n = replyInteger(reply)

    if (n === 1) return { kind: "written" }
    if (n === 0) return { kind: "stale" }

    throw this.malformed(operation, key, reply)
  }

  private malformed(operation: StoreOperation, key: RecordKey, reply: unknown) {
    return new StoreUnavailableError(
      `Unexpected reply from Redis ${operation} for key "${key}"`,
      { operation, key, reason: "malformed_reply" },
      new TypeError(`unexpected reply: ${JSON.stringify(reply)}`),
    )
  }

  private toBuffer(value: Uint8Array): Buffer {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }

  private normalizePrefix(prefix: string): string {
    if (prefix === "") return ""

    return prefix.endsWith(":") ? prefix : `${prefix}:`
  }

  private formatKey(key: RecordKey): string {
    return `${this.prefix}${key}`
  }
}

export function createRedisRecordStore(
  deps: RedisRecordStoreDeps,
  opts: RedisRecordStoreOptions,
): RedisRecordStore {
  return new RedisRecordStore(deps, opts)
}
