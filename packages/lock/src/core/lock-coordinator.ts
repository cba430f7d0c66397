import {
  createJitteredDelay,
  type DelayPolicy,
  type RandomSource,
  systemRandom,
} from "@herdguard/backoff"
import type { Milliseconds, TimeSource } from "@herdguard/clock"
import { createNullLogger, type Logger } from "@herdguard/logger"
import type {
  FencedWriteResult,
  OwnerToken,
  ReadAndLockResult,
  RecordKey,
  RecordStore,
  RecordTtl,
  TagResult,
} from "@herdguard/store"
import { uuidToken } from "../adapters/token/uuid-token"
import type { LockDecision } from "../ports/lock-decision"
import type { LockCoordinatorConfig } from "../ports/options"
import type { TokenGenerator } from "../ports/token-generator"

export type LockCoordinatorDeps = {
  store: RecordStore
  clock: TimeSource
  random?: RandomSource
  generateToken?: TokenGenerator
  logger?: Logger
}

/**
 * Turns atomic record operations into lock decisions and fenced writes.
 *
 * @remarks
 * Holds no state of its own: every decision is one `readAndLock` round trip,
 * so any number of coordinators (in any number of processes) can share a store.
 */
export class LockCoordinator {
  private readonly lockDuration: DelayPolicy
  private readonly lockTtlMaxMs: Milliseconds
  private readonly generateToken: TokenGenerator
  private readonly logger: Logger

  public constructor(
    private readonly deps: LockCoordinatorDeps,
    private readonly config: LockCoordinatorConfig,
  ) {
    this.lockDuration = createJitteredDelay(config.lockTtl, deps.random ?? systemRandom)
    this.lockTtlMaxMs = config.lockTtl.milliseconds + config.lockTtl.jitterMs
    this.generateToken = deps.generateToken ?? uuidToken
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "lock-coordinator" })
  }

  /**
   * Reads `key` and locks it when absent or stale. `ttl` is the logical TTL
   * the caller will commit with; it only sizes the physical TTL.
   */
  async decide(key: RecordKey, ttl: RecordTtl): Promise<LockDecision> {
    const owner = this.generateToken()
    const now = this.deps.clock.nowMs()
    const lockUntil = now + this.lockDuration.getDelay(0).milliseconds

    const result = await this.deps.store.readAndLock(key, {
      now,
      owner,
      lockUntil,
      physicalTtl: this.physicalTtl(ttl),
    })

    const decision = this.toDecision(owner, result)

    this.logger.trace("lock decision", {
      key,
      decision: decision.kind,
      ...(result.acquired && { owner }),
    })

    return decision
  }

  /** Stores `value` valid for `ttl` if `owner` still holds the lock. */
  async commit(
    key: RecordKey,
    owner: OwnerToken,
    value: Uint8Array,
    ttl: RecordTtl,
  ): Promise<FencedWriteResult> {
    const now = this.deps.clock.nowMs()

    return await this.deps.store.writeResult(key, {
      owner,
      value,
      lockUntil: now + ttl.milliseconds,
      physicalTtl: this.physicalTtl(ttl),
    })
  }

  /** Gives up `owner`'s lock without writing, keeping any previous value. */
  async release(key: RecordKey, owner: OwnerToken): Promise<FencedWriteResult> {
    return await this.deps.store.release(key, {
      owner,
      now: this.deps.clock.nowMs(),
      physicalTtl: this.config.deletedRetention,
    })
  }

  /**
   * Marks a valid value stale. Idempotent. A live lock keeps its owner, but
   * whatever that owner commits is already stale.
   */
  async tagAsDeleted(key: RecordKey): Promise<TagResult> {
    const result = await this.deps.store.tagAsDeleted(key, {
      now: this.deps.clock.nowMs(),
      physicalTtl: this.config.deletedRetention,
    })

    this.logger.debug("tag as deleted", {
      key,
      decision: result.kind === "skipped" ? result.reason : result.kind,
    })

    return result
  }

  private toDecision(owner: OwnerToken, { record, acquired }: ReadAndLockResult): LockDecision {
    if (acquired) {
      return record === null
        ? { kind: "miss", owner }
        : { kind: "needs-fetch", owner, stale: record.value }
    }

    if (record === null || record.lockOwner !== null) {
      return { kind: "locked-by-other", stale: record?.value ?? null }
    }

    if (record.value !== null) return { kind: "hit", value: record.value }

    return { kind: "locked-by-other", stale: null }
  }

  private physicalTtl(ttl: RecordTtl): RecordTtl {
    const retention = this.config.deletedRetention.milliseconds

    return { milliseconds: ttl.milliseconds + this.lockTtlMaxMs + retention }
  }
}

export function createLockCoordinator(
  deps: LockCoordinatorDeps,
  config: LockCoordinatorConfig,
): LockCoordinator {
  return new LockCoordinator(deps, config)
}
