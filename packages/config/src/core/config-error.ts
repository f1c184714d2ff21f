import { BaseError } from "@larder/errors"

export class ConfigError extends BaseError<"config_invalid"> {
  static invalid(summary: string, sources: readonly string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${summary}`, {
      code: "config_invalid",
      context: { sources },
      isOperational: false,
    })
  }
}
