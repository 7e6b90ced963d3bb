/**
 * Machine-readable error code, lower snake case by convention
 * (e.g. `argument_null`, `service_not_registered`).
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if retrying the same call might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures, `false` for programmer errors
   * (a missing required argument, a broken container graph).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for log payloads.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
