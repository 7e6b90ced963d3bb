import { createError } from "@tessera/errors"
import { globalLogger } from "../../core/global-logger"
import type {
  AddProviderOptions,
  LoggerProviderCollection,
} from "../../core/logger-provider-collection"
import { isRootLogger, type Logger } from "../../ports/logger"
import type { LoggerFactory } from "../../ports/logger-factory"
import type { LoggerProvider } from "../../ports/logger-provider"

/**
 * {@link LoggerFactory} backed by a pino pipeline.
 *
 * Disposal depends on how the factory was constructed:
 *
 * | `logger` | `ownsLogger` | `dispose()`                             |
 * | -------- | ------------ | --------------------------------------- |
 * | `null`   | `true`       | `globalLogger.closeAndFlush()`          |
 * | handle   | `true`       | disposes the handle if it is a root     |
 * | any      | `false`      | nothing                                 |
 */
export class PinoLoggerFactory implements LoggerFactory {
  private disposed = false

  /**
   * @param logger - the pipeline to log through; `null` means whatever the
   *   global logger is when `createLogger` runs
   * @param ownsLogger - whether `dispose()` releases the logger
   * @param providers - collection the pipeline forwards to; `addProvider`
   *   ignores providers without one
   */
  constructor(
    private readonly logger: Logger | null = null,
    private readonly ownsLogger: boolean = false,
    private readonly providers?: LoggerProviderCollection,
  ) {}

  createLogger(category: string): Logger {
    this.assertNotDisposed()

    return (this.logger ?? globalLogger.get()).child({ category })
  }

  /**
   * Adds `provider` to the pipeline's provider collection. Without a
   * collection the provider is ignored, and a debug event says so.
   */
  addProvider(provider: LoggerProvider, options?: AddProviderOptions): void {
    this.assertNotDisposed()

    if (!this.providers) {
      globalLogger.get().debug("Ignoring added logger provider {provider}", {
        provider: provider.constructor.name,
      })
      return
    }

    this.providers.add(provider, options)
  }

  async dispose(): Promise<void> {
    if (this.disposed) return
    this.disposed = true

    if (!this.ownsLogger) return

    if (this.logger === null) {
      await globalLogger.closeAndFlush()
    } else if (isRootLogger(this.logger)) {
      await this.logger.dispose()
    }
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw createError("object_disposed", "Cannot use a disposed PinoLoggerFactory")
    }
  }
}
