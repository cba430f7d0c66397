import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  const levels = ["trace", "debug", "info", "warn", "error", "fatal"] as const

  it.each(levels)("accepts %s lines", (level) => {
    const logger = createNullLogger()

    expect(
      logger[level]("background refresh failed", { key: "user:1", err: new Error("db down") }),
    ).toBeUndefined()
  })

  it("stays silent through any depth of children", () => {
    const scoped = new NullLogger()
      .child({ module: "cache-client" })
      .child({ key: "user:1", owner: "owner-1" })

    expect(scoped).toBeInstanceOf(NullLogger)
    expect(() => scoped.warn("failed to release lock")).not.toThrow()
  })
})
