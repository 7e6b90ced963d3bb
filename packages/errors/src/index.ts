export { ArgumentNullError, argumentNotNull } from "./core/argument-null-error"
export {
  BaseError,
  type BaseErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/base-error"
export { createError } from "./core/utils/create-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
