import type { IServiceProvider, ServiceCollection } from "@tessera/container"
import { argumentNotNull } from "@tessera/errors"
import {
  type Logger,
  type LoggerProviderCollection,
  PinoLoggerFactory,
} from "@tessera/logger"
import { LOGGER_FACTORY, LOGGER_PROVIDER } from "./tokens"

export type UseLoggerOptions = {
  /**
   * Logger to create category loggers from. When omitted, the factory uses
   * whatever `globalLogger` holds at the time each logger is created.
   */
  logger?: Logger | null

  /**
   * Whether disposing the factory releases the logger. Without a `logger`
   * this closes and resets the global logger. Defaults to `false`.
   */
  dispose?: boolean

  /**
   * Collection the logger's pipeline forwards to (see
   * `LoggerConfiguration.writeToProviders`). Every `LOGGER_PROVIDER`
   * service is added to it when the factory is resolved.
   */
  providers?: LoggerProviderCollection
}

/**
 * Registers a {@link LOGGER_FACTORY} singleton backed by an existing
 * logger, or by the global logger.
 *
 * Registering again replaces the previous factory for resolution.
 */
export function useLogger(
  collection: ServiceCollection,
  options: UseLoggerOptions = {},
): ServiceCollection {
  argumentNotNull(collection, "collection")

  const { logger = null, dispose = false, providers } = options

  return collection.addSingleton(LOGGER_FACTORY, (services) =>
    createLoggerFactory(services, logger, dispose, providers),
  )
}

/** @internal */
export function createLoggerFactory(
  services: IServiceProvider,
  logger: Logger | null,
  ownsLogger: boolean,
  providers: LoggerProviderCollection | undefined,
): PinoLoggerFactory {
  const factory = new PinoLoggerFactory(logger, ownsLogger, providers)

  if (providers) {
    // Container-built providers are disposed by the container, not the pipeline.
    for (const provider of services.getServices(LOGGER_PROVIDER)) {
      factory.addProvider(provider, { owned: false })
    }
  }

  return factory
}
