import { BaseError, serializeError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("sets message, code and defaults", () => {
      const err = new BaseError("store call failed", { code: "store_unavailable" })

      expect(err.message).toBe("store call failed")
      expect(err.code).toBe("store_unavailable")
      expect(err.name).toBe("BaseError")
      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("keeps cause and flags", () => {
      const cause = new Error("ECONNREFUSED")
      const err = new BaseError("store call failed", {
        code: "store_unavailable",
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes a copy of the context", () => {
      const context = { key: "user:1" }
      const err = new BaseError("bad", { code: "invalid_options", context })

      context.key = "user:2"

      expect(err.context).toEqual({ key: "user:1" })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("uses the subclass name", () => {
      class StoreDownError extends BaseError<"store_unavailable"> {}

      const err = new StoreDownError("down", { code: "store_unavailable" })

      expect(err.name).toBe("StoreDownError")
      expect(err).toBeInstanceOf(Error)
    })
  })

  describe("toJSON", () => {
    it("serializes through serializeError", () => {
      const err = new BaseError("bad ttl", {
        code: "invalid_options",
        context: { ttlMs: -1 },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "invalid_options",
        message: "bad ttl",
        context: { ttlMs: -1 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes the cause chain", () => {
    const err = new BaseError("script failed", {
      code: "store_unavailable",
      cause: new Error("socket closed"),
    })

    expect(serializeError(err).cause).toEqual({
      name: "Error",
      code: "unknown",
      message: "socket closed",
      context: {},
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("stops following causes at maxDepth", () => {
    const inner = new Error("inner")
    const outer = new BaseError("outer", { code: "store_unavailable", cause: inner })

    expect(serializeError(outer, { maxDepth: 0 }).cause).toBeUndefined()
  })

  it("includes the stack only when asked", () => {
    const err = new Error("boom")

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toBe(err.stack)
  })

  it("wraps thrown strings", () => {
    expect(serializeError("oops")).toEqual({
      name: "NonErrorThrown",
      code: "unknown",
      message: "oops",
      context: {},
      isOperational: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("keeps other thrown values in context", () => {
    expect(serializeError(42).context).toEqual({ value: 42 })
  })
})
