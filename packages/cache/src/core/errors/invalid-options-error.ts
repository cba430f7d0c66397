import { BaseError, type ErrorContext } from "@herdguard/errors"

export class InvalidOptionsError extends BaseError<"invalid_options"> {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, { code: "invalid_options", context, cause })
  }
}
