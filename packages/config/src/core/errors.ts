import { BaseError } from "@rangecache/errors"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(issues: string) {
    super(`Configuration validation failed:\n${issues}`, {
      code: "config_invalid",
      context: { issues },
      isOperational: false,
    })
  }
}

export class ConfigSourceError extends BaseError<"config_source_failed"> {
  constructor(source: string, cause: unknown) {
    super(`Configuration source "${source}" failed to load`, {
      code: "config_source_failed",
      context: { source },
      cause,
    })
  }
}
