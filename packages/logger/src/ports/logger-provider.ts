import type { Logger } from "./logger"

/**
 * A secondary log destination that hands out a logger per category.
 */
export interface LoggerProvider {
  createLogger(category: string): Logger
  dispose?(): void | Promise<void>
}
