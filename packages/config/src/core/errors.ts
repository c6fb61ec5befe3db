import { BaseError, createError } from "@barconf/errors"

export type ConfigErrorCode =
  | "config_unreadable"
  | "config_invalid_json"
  | "config_value_not_integer"
  | "config_too_many_variables"
  | "config_update_rate_out_of_range"
  | "config_invalid_environment"

/**
 * A configuration problem the application cannot run with. Every ConfigError
 * is non-operational: the top level terminates the process on it.
 */
export type ConfigError = BaseError<ConfigErrorCode>

const CONFIG_ERROR_CODES: ReadonlySet<string> = new Set<ConfigErrorCode>([
  "config_unreadable",
  "config_invalid_json",
  "config_value_not_integer",
  "config_too_many_variables",
  "config_update_rate_out_of_range",
  "config_invalid_environment",
])

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof BaseError && CONFIG_ERROR_CODES.has(err.code)
}

export function unreadableError(path: string, cause: unknown): ConfigError {
  return createError("config_unreadable", `Failed reading config file from '${path}'`, {
    context: { path },
    cause,
    isOperational: false,
  })
}

export function invalidJsonError(path: string, cause: unknown): ConfigError {
  return createError("config_invalid_json", `Failed parsing config from '${path}'`, {
    context: { path },
    cause,
    isOperational: false,
  })
}

export function notIntegerError(root: string, key: string): ConfigError {
  return createError("config_value_not_integer", `Failed parsing ${root}:${key} as a 32-bit integer`, {
    context: { root, key },
    isOperational: false,
  })
}

export function tooManyVariablesError(count: number, max: number): ConfigError {
  return createError("config_too_many_variables", `You cannot have more than ${max} variables`, {
    context: { count, max },
    isOperational: false,
  })
}

export function updateRateOutOfRangeError(value: number): ConfigError {
  return createError(
    "config_update_rate_out_of_range",
    "Cannot convert update_rate into unsigned milliseconds",
    { context: { value }, isOperational: false },
  )
}

export function invalidEnvironmentError(details: string): ConfigError {
  return createError("config_invalid_environment", `Invalid environment:\n${details}`, {
    isOperational: false,
  })
}

/**
 * Classify anything a source threw. ConfigErrors pass through; everything else
 * counts as the source being unreadable.
 */
export function toConfigError(err: unknown, sourceName: string): ConfigError {
  if (isConfigError(err)) return err

  return unreadableError(sourceName, err)
}
