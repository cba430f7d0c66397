import { mock } from "vitest-mock-extended"
import { StoreUnavailableError } from "../../../core/store-unavailable-error"
import type { Mock } from "../../../tests/mock"
import { PHYSICAL_TTL } from "../../../tests/utils/record-test-helpers"
import { READ_AND_LOCK, RELEASE, TAG_AS_DELETED, WRITE_RESULT } from "../record-scripts"
import type { RedisScriptClient } from "../redis-client"
import { RedisRecordStore } from "../redis-record-store"

describe("RedisRecordStore behavior", () => {
  let client: Mock<RedisScriptClient>
  let store: RedisRecordStore

  beforeEach(() => {
    client = mock<RedisScriptClient>()
    store = new RedisRecordStore({ client }, { keyspacePrefix: "app:cache" })
  })

  describe("readAndLock", () => {
    it("sends the prefixed key and stringified arguments", async () => {
      client.evalSha.mockResolvedValue([0, null, null, null, 1])

      const result = await store.readAndLock("user:1", {
        now: 1_000,
        owner: "owner-a",
        lockUntil: 4_000,
        physicalTtl: PHYSICAL_TTL,
      })

      expect(result).toEqual({ record: null, acquired: true })
      expect(client.evalSha).toHaveBeenCalledWith(READ_AND_LOCK.sha1, {
        keys: ["app:cache:user:1"],
        arguments: ["1000", "4000", "owner-a", "60000"],
      })
    })

    it("decodes an existing record", async () => {
      client.evalSha.mockResolvedValue([
        1,
        Buffer.from([1, 2]),
        Buffer.from("5000"),
        Buffer.from("owner-b"),
        0,
      ])

      const result = await store.readAndLock("k", {
        now: 1_000,
        owner: "owner-a",
        lockUntil: 4_000,
        physicalTtl: PHYSICAL_TTL,
      })

      expect(result).toEqual({
        record: { value: new Uint8Array([1, 2]), lockUntil: 5_000, lockOwner: "owner-b" },
        acquired: false,
      })
    })

    it("reads a record without lockUntil as lockUntil 0", async () => {
      client.evalSha.mockResolvedValue([1, Buffer.from("x"), null, null, 1])

      const result = await store.readAndLock("k", {
        now: 1_000,
        owner: "owner-a",
        lockUntil: 4_000,
        physicalTtl: PHYSICAL_TTL,
      })

      expect(result.record).toEqual({
        value: new TextEncoder().encode("x"),
        lockUntil: 0,
        lockOwner: null,
      })
    })

    it("rejects a malformed reply with StoreUnavailableError", async () => {
      client.evalSha.mockResolvedValue("OK")

      const promise = store.readAndLock("k", {
        now: 1_000,
        owner: "owner-a",
        lockUntil: 4_000,
        physicalTtl: PHYSICAL_TTL,
      })

      await expect(promise).rejects.toBeInstanceOf(StoreUnavailableError)
      await expect(promise).rejects.toMatchObject({
        code: "store_unavailable",
        isRetryable: true,
        context: { operation: "readAndLock", key: "k", reason: "malformed_reply" },
      })
    })
  })

  describe("writeResult", () => {
    it("passes the value as a Buffer and maps 1 to written", async () => {
      client.evalSha.mockResolvedValue(1)

      const result = await store.writeResult("k", {
        owner: "owner-a",
        value: new Uint8Array([1, 2, 3]),
        lockUntil: 9_000,
        physicalTtl: PHYSICAL_TTL,
      })

      expect(result).toEqual({ kind: "written" })
      expect(client.evalSha).toHaveBeenCalledWith(WRITE_RESULT.sha1, {
        keys: ["app:cache:k"],
        arguments: ["owner-a", Buffer.from([1, 2, 3]), "9000", "60000"],
      })
    })

    it("maps 0 to stale", async () => {
      client.evalSha.mockResolvedValue(0)

      await expect(
        store.writeResult("k", {
          owner: "owner-a",
          value: new Uint8Array([1]),
          lockUntil: 9_000,
          physicalTtl: PHYSICAL_TTL,
        }),
      ).resolves.toEqual({ kind: "stale" })
    })

    it("falls back to EVAL when the script is not cached", async () => {
      client.evalSha.mockRejectedValue(new Error("NOSCRIPT No matching script"))
      client.eval.mockResolvedValue(1)

      await expect(
        store.writeResult("k", {
          owner: "owner-a",
          value: new Uint8Array([1]),
          lockUntil: 9_000,
          physicalTtl: PHYSICAL_TTL,
        }),
      ).resolves.toEqual({ kind: "written" })

      expect(client.eval).toHaveBeenCalledWith(WRITE_RESULT.source, {
        keys: ["app:cache:k"],
        arguments: ["owner-a", Buffer.from([1]), "9000", "60000"],
      })
    })
  })

  describe("release", () => {
    it("wraps transport failures with the original as cause", async () => {
      const failure = new Error("Socket closed unexpectedly")
      client.evalSha.mockRejectedValue(failure)

      const promise = store.release("k", {
        owner: "owner-a",
        now: 1_000,
        physicalTtl: PHYSICAL_TTL,
      })

      await expect(promise).rejects.toMatchObject({
        code: "store_unavailable",
        context: { operation: "release", key: "k" },
        cause: failure,
      })
      expect(client.evalSha).toHaveBeenCalledWith(RELEASE.sha1, {
        keys: ["app:cache:k"],
        arguments: ["owner-a", "1000", "60000"],
      })
    })
  })

  describe("tagAsDeleted", () => {
    it.each([
      ["tagged", { kind: "tagged" }],
      ["not_found", { kind: "skipped", reason: "not_found" }],
      ["tagged_while_locked", { kind: "tagged_while_locked" }],
      ["already_stale", { kind: "skipped", reason: "already_stale" }],
    ])("maps %s", async (status, expected) => {
      client.evalSha.mockResolvedValue(Buffer.from(status))

      await expect(
        store.tagAsDeleted("k", { now: 1_000, physicalTtl: { milliseconds: 10_000 } }),
      ).resolves.toEqual(expected)
      expect(client.evalSha).toHaveBeenCalledWith(TAG_AS_DELETED.sha1, {
        keys: ["app:cache:k"],
        arguments: ["1000", "10000"],
      })
    })

    it("rejects an unknown status", async () => {
      client.evalSha.mockResolvedValue(Buffer.from("deleted"))

      await expect(
        store.tagAsDeleted("k", { now: 1_000, physicalTtl: PHYSICAL_TTL }),
      ).rejects.toBeInstanceOf(StoreUnavailableError)
    })
  })

  describe("keyspace prefix", () => {
    it.each([
      ["app", "app:k"],
      ["app:", "app:k"],
      ["", "k"],
    ])("prefix %j yields %s", async (keyspacePrefix, fullKey) => {
      const prefixed = new RedisRecordStore({ client }, { keyspacePrefix })
      client.evalSha.mockResolvedValue(0)

      await prefixed.release("k", { owner: "o", now: 1, physicalTtl: PHYSICAL_TTL })

      expect(client.evalSha).toHaveBeenCalledWith(
        RELEASE.sha1,
        expect.objectContaining({ keys: [fullKey] }),
      )
    })
  })
})
