import { BaseError } from "./base-error"

/**
 * Raised when a required argument is `null` or `undefined`.
 *
 * Always a programmer error, so `isOperational` is `false`.
 */
export class ArgumentNullError extends BaseError<"argument_null"> {
  readonly paramName: string

  constructor(paramName: string) {
    super(`Value cannot be null or undefined (parameter '${paramName}')`, {
      code: "argument_null",
      context: { paramName },
      isOperational: false,
    })

    this.paramName = paramName
  }
}

export function argumentNotNull<T>(
  value: T,
  paramName: string,
): asserts value is NonNullable<T> {
  if (value === null || value === undefined) {
    throw new ArgumentNullError(paramName)
  }
}
