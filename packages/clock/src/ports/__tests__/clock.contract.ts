import type { Clock } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
}

/** What the lock coordinator relies on from any clock it is given. */
export function describeClockContract(h: ClockHarness) {
  describe(`${h.name} (Clock contract)`, () => {
    it("reports epoch milliseconds as a safe integer", () => {
      const ms = h.make().nowMs()

      expect(Number.isSafeInteger(ms)).toBe(true)
      expect(ms).toBeGreaterThanOrEqual(0)
    })

    it("agrees between now() and nowMs()", () => {
      const clock = h.make()

      expect(Math.abs(clock.now().getTime() - clock.nowMs())).toBeLessThan(5)
    })

    it("never runs backwards across a sleep", async () => {
      const clock = h.make()
      const before = clock.nowMs()

      await clock.sleep(5)

      expect(clock.nowMs()).toBeGreaterThanOrEqual(before)
    })

    it("resolves a zero-length sleep", async () => {
      await expect(h.make().sleep(0)).resolves.toBeUndefined()
    })

    it("returns at once for a signal that is already aborted", async () => {
      const clock = h.make()

      await expect(clock.sleep(60_000, AbortSignal.abort())).resolves.toBeUndefined()
    })
  })
}
