import type { Delay, DelayPolicy } from "../../ports/delay-policy"

export interface ConstantOptions {
  delay: Delay
}

/** Same base on every attempt; lock polling adds jitter on top. */
export function constant({ delay }: ConstantOptions): DelayPolicy {
  const fixed: Delay = { milliseconds: delay.milliseconds }

  return {
    getDelay: () => ({ ...fixed }),
  }
}
