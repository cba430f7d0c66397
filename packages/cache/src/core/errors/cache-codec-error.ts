import { BaseError, type ErrorContext } from "@herdguard/errors"

export class CacheCodecError extends BaseError<"codec_failed"> {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, { code: "codec_failed", context, cause })
  }
}
