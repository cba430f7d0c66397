import type { RecordTtl } from "../ports/cache-record"

export function assertEpochMs(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got: ${value}`)
  }
}

/** PEXPIRE with 0 deletes the key, so physical TTLs must be strictly positive. */
export function assertPhysicalTtl(ttl: RecordTtl, name = "physicalTtl"): void {
  if (!Number.isSafeInteger(ttl.milliseconds) || ttl.milliseconds <= 0) {
    throw new RangeError(`${name} must be a positive integer, got: ${ttl.milliseconds}`)
  }
}

export function assertOwner(owner: string): void {
  if (owner.length === 0) {
    throw new RangeError("owner token must not be empty")
  }
}
