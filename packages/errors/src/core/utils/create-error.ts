import type { ErrorCode } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

/**
 * Shorthand for `new BaseError(message, { code, ...options })`.
 *
 * @example
 * ```ts
 * throw createError("config_unreadable", "Failed reading config file", {
 *   context: { path },
 *   isOperational: false,
 * })
 * ```
 */
export function createError<C extends ErrorCode>(
  code: C,
  message: string,
  options?: Omit<BaseErrorOptions<C>, "code">,
): BaseError<C> {
  return new BaseError(message, { code, ...options })
}
