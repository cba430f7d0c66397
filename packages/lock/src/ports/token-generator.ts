import type { OwnerToken } from "@herdguard/store"

/** Must return a value never handed out before, across every process sharing the store. */
export type TokenGenerator = () => OwnerToken
