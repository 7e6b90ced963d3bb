import { NullLogger } from "../adapters/null/null-logger"
import { isRootLogger, type Logger } from "../ports/logger"

let current: Logger = new NullLogger()

/**
 * The process-wide "current" logger, for code that cannot have a logger
 * injected.
 *
 * Lifecycle: starts as a no-op logger; a composition root may `set` its
 * root logger here; `closeAndFlush` puts a fresh no-op logger back and
 * disposes whatever was installed. All reads and writes go through this
 * object.
 */
export const globalLogger = {
  get(): Logger {
    return current
  },

  set(logger: Logger): void {
    current = logger
  },

  /**
   * Resets the slot to a no-op logger, then disposes the previous logger
   * if it owns a pipeline.
   */
  async closeAndFlush(): Promise<void> {
    const previous = current
    current = new NullLogger()

    if (isRootLogger(previous)) {
      await previous.dispose()
    }
  },
}
