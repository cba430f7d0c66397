import type { RandomSource } from "../ports/random-source"

export const systemRandom: RandomSource = {
  next(): number {
    return Math.random()
  },
}

function assertUnitInterval(value: number): void {
  if (!Number.isFinite(value) || value < 0 || value >= 1) {
    throw new RangeError(`random value must be in [0, 1) (got ${value})`)
  }
}

/** Always returns `value`. */
export function fixedRandom(value: number): RandomSource {
  assertUnitInterval(value)

  return { next: () => value }
}

/** Returns `values` in order, then keeps returning the last one. */
export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError("sequenceRandom needs at least one value")
  }

  for (const value of values) assertUnitInterval(value)

  let i = 0

  return {
    next(): number {
      const value = values[Math.min(i, values.length - 1)] ?? 0
      i++
      return value
    },
  }
}
