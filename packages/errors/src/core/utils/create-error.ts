import type { ErrorCode } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

/**
 * Shorthand for `new BaseError(message, { code, ...options })`.
 *
 * @example
 * ```ts
 * throw createError("service_not_registered", "No service for LoggerFactory", {
 *   context: { service: "LoggerFactory" },
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
