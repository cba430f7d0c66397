import { BaseError } from "@herdguard/errors"

export type StoreOperation = "readAndLock" | "writeResult" | "release" | "tagAsDeleted"

/**
 * The store could not complete an operation: transport failure, script
 * error or a reply in an unexpected shape.
 */
export class StoreUnavailableError extends BaseError<"store_unavailable"> {
  constructor(
    message: string,
    context: { operation: StoreOperation; key: string; reason?: string },
    cause?: unknown,
  ) {
    super(message, {
      code: "store_unavailable",
      context,
      cause,
      isRetryable: true,
    })
  }
}
