import type { LogContextPatch, LogMeta } from "./log-context"
import type { LogEnricher } from "./log-enricher"

export interface Logger {
  trace(message: string, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  fatal(message: string, meta?: LogMeta): void

  /**
   * Creates a child logger that inherits the parent context and adds
   * additional contextual fields.
   *
   * This is intended for scoping logs to a request, operation, or
   * execution context (e.g. requestId, userId, tenantId).
   */
  child(context: LogContextPatch): Logger

  /**
   * Creates a logger on the same pipeline that also runs `enricher`
   * for every event it writes.
   */
  withEnricher(enricher: LogEnricher): Logger
}

/**
 * A logger that owns its pipeline.
 *
 * Loggers derived from a root (`child`, `withEnricher`) share the pipeline
 * but never expose `dispose`; only the root can close it.
 */
export interface RootLogger extends Logger {
  readonly isClosed: boolean

  /**
   * Flushes pending output and closes the pipeline. Events written through
   * this logger or any logger derived from it are dropped afterwards.
   */
  dispose(): Promise<void>
}

export function isRootLogger(logger: Logger): logger is RootLogger {
  return "dispose" in logger && typeof logger.dispose === "function"
}
