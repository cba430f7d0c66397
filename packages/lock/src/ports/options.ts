import type { JitteredDelay } from "@herdguard/backoff"
import type { Milliseconds } from "@herdguard/clock"

export type LockCoordinatorConfig = {
  /**
   * Lock lifetime. Each acquisition picks uniformly in
   * `[milliseconds, milliseconds + jitterMs]`.
   */
  lockTtl: JitteredDelay

  /** How long a tagged or released-empty record physically survives. */
  deletedRetention: { milliseconds: Milliseconds }
}
