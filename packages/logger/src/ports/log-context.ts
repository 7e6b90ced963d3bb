export type LogContext = {
  requestId: string
  traceId: string
  spanId: string

  service: string
  module: string
  env: string

  /** Logger category, bound by `LoggerFactory.createLogger` */
  category: string
}

export type LogEvent = {
  err: unknown
}

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>

/**
 * Per-call metadata. Its fields double as the values for `{name}`
 * placeholders in the message template.
 */
export type LogMeta = LogContextPatch & Partial<LogEvent>
