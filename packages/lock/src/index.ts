export { uuidToken } from "./adapters/token/uuid-token"
export {
  createLockCoordinator,
  LockCoordinator,
  type LockCoordinatorDeps,
} from "./core/lock-coordinator"
export {
  type PollDeps,
  type PollOptions,
  type PollStep,
  type PollUntilFailure,
  type PollUntilFn,
  type PollUntilResult,
  pollUntil,
} from "./core/polling/poll-until"
export type { LockDecision, LockDecisionKind } from "./ports/lock-decision"
export type { LockCoordinatorConfig } from "./ports/options"
export type { TokenGenerator } from "./ports/token-generator"
