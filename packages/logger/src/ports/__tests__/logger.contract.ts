import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("writes the message with the per-call fields", () => {
      const { logger, captured } = h.make("trace")

      logger.debug("lock decision", { key: "user:1", decision: "miss" })

      expect(captured()).toEqual([
        expect.objectContaining({
          level: "debug",
          message: "lock decision",
          fields: expect.objectContaining({ key: "user:1", decision: "miss" }),
        }),
      ])
    })

    it("stacks child contexts, the innermost winning", () => {
      const { logger, captured } = h.make("trace")

      logger
        .child({ module: "cache-client", key: "user:1" })
        .child({ key: "user:2", owner: "owner-1" })
        .info("stored loader result")

      expect(captured()[0]?.fields).toMatchObject({
        module: "cache-client",
        key: "user:2",
        owner: "owner-1",
      })
    })

    it("leaves the parent's context alone", () => {
      const { logger, captured } = h.make("trace")
      const parent = logger.child({ module: "lock-coordinator" })

      parent.child({ owner: "owner-1" })
      parent.info("tag as deleted")

      expect(captured()[0]?.fields).not.toHaveProperty("owner")
    })

    it("lets per-call fields override the bound context", () => {
      const { logger, captured } = h.make("trace")

      logger.child({ attempt: 0 }).trace("waiting on lock", { attempt: 4 })

      expect(captured()[0]?.fields).toMatchObject({ attempt: 4 })
    })

    it("drops lines below the configured level", () => {
      const { logger, captured } = h.make("warn")

      logger.trace("t")
      logger.debug("d")
      logger.info("i")
      logger.warn("w")
      logger.error("e")
      logger.fatal("f")

      expect(captured().map((line) => line.level)).toEqual(["warn", "error", "fatal"])
    })
  })
}
