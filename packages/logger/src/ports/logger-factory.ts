import type { Logger } from "./logger"
import type { LoggerProvider } from "./logger-provider"

/**
 * Application-facing logging abstraction. Code that logs depends on this
 * port, never on the structured logger behind it.
 */
export interface LoggerFactory {
  /** Returns a logger with `category` bound to every event. */
  createLogger(category: string): Logger

  addProvider(provider: LoggerProvider): void

  dispose(): Promise<void>
}
