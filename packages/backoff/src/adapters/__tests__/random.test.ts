import { fixedRandom, sequenceRandom, systemRandom } from "../random"

describe("systemRandom", () => {
  it("returns a finite number in [0, 1)", () => {
    for (let i = 0; i < 1000; i++) {
      const value = systemRandom.next()

      expect(Number.isFinite(value)).toBe(true)
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })
})

describe("fixedRandom", () => {
  it("always returns the pinned value", () => {
    const random = fixedRandom(0.25)

    expect(random.next()).toBe(0.25)
    expect(random.next()).toBe(0.25)
  })

  it("rejects values outside [0, 1)", () => {
    expect(() => fixedRandom(1)).toThrow(RangeError)
    expect(() => fixedRandom(-0.1)).toThrow(RangeError)
    expect(() => fixedRandom(Number.NaN)).toThrow(RangeError)
  })
})

describe("sequenceRandom", () => {
  it("returns values in order and repeats the last one", () => {
    const random = sequenceRandom([0.1, 0.5, 0.9])

    expect([random.next(), random.next(), random.next(), random.next()]).toEqual([
      0.1, 0.5, 0.9, 0.9,
    ])
  })

  it("rejects an empty sequence", () => {
    expect(() => sequenceRandom([])).toThrow(RangeError)
  })
})
