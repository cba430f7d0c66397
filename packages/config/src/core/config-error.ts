import { BaseError } from "@herdguard/errors"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(details: string, sources: string[]) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { sources },
    })
  }
}
