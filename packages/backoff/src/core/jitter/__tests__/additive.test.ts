import { fixedRandom, sequenceRandom } from "../../../adapters/random"
import { additiveJitter } from "../additive"

describe("additiveJitter", () => {
  const range = { milliseconds: 50 }

  it("adds nothing when random returns 0", () => {
    const jitter = additiveJitter({ range }, fixedRandom(0))

    expect(jitter.apply({ milliseconds: 100 })).toEqual({ milliseconds: 100 })
  })

  it("adds the full range when random returns ~1", () => {
    const jitter = additiveJitter({ range }, fixedRandom(0.999))

    expect(jitter.apply({ milliseconds: 100 })).toEqual({ milliseconds: 150 })
  })

  it("adds a proportional share of the range", () => {
    const jitter = additiveJitter({ range }, sequenceRandom([0.1, 0.5]))

    expect(jitter.apply({ milliseconds: 100 })).toEqual({ milliseconds: 105 })
    expect(jitter.apply({ milliseconds: 100 })).toEqual({ milliseconds: 125 })
  })

  it("is a no-op with a zero range", () => {
    const jitter = additiveJitter({ range: { milliseconds: 0 } }, fixedRandom(0.9))

    expect(jitter.apply({ milliseconds: 3000 })).toEqual({ milliseconds: 3000 })
  })
})
