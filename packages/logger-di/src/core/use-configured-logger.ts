import type { IServiceProvider, ServiceCollection } from "@tessera/container"
import { argumentNotNull } from "@tessera/errors"
import {
  globalLogger,
  LoggerConfiguration,
  LoggerProviderCollection,
  nullEnricher,
} from "@tessera/logger"
import { RegisteredLogger } from "./registered-logger"
import { LOGGER, LOGGER_FACTORY, REGISTERED_LOGGER } from "./tokens"
import { createLoggerFactory } from "./use-logger"

export type UseConfiguredLoggerOptions = {
  /**
   * Leave `globalLogger` untouched. The factory then owns the built logger
   * directly instead of owning it through the global slot. Defaults to
   * `false`.
   */
  preserveGlobalLogger?: boolean

  /**
   * Forward every event to the `LOGGER_PROVIDER` services. Defaults to
   * `false`.
   */
  writeToProviders?: boolean
}

export type ConfigureLogger = (configuration: LoggerConfiguration) => void

export type ConfigureLoggerWithServices = (
  services: IServiceProvider,
  configuration: LoggerConfiguration,
) => void

/**
 * Like {@link useServiceConfiguredLogger}, for configuration that needs no
 * other services.
 */
export function useConfiguredLogger(
  collection: ServiceCollection,
  configure: ConfigureLogger,
  options: UseConfiguredLoggerOptions = {},
): ServiceCollection {
  argumentNotNull(collection, "collection")
  argumentNotNull(configure, "configure")

  return useServiceConfiguredLogger(
    collection,
    (_services, configuration) => configure(configuration),
    options,
  )
}

/**
 * Registers a logger pipeline that is built from `configure` the first time
 * any of its services is resolved.
 *
 * Adds three singletons:
 *
 * - {@link REGISTERED_LOGGER}: the built root logger, wrapped so the
 *   container does not dispose it
 * - {@link LOGGER}: a logger on the same pipeline for application code
 * - {@link LOGGER_FACTORY}: the logging factory, which owns the root
 *
 * Unless `preserveGlobalLogger` is set, resolving the factory installs the
 * root as the global logger, and disposing the factory closes the global
 * logger and resets it to a no-op logger. With `preserveGlobalLogger`, the
 * global logger is never touched and disposing the factory closes the root
 * directly. Either way the root is closed exactly once.
 */
export function useServiceConfiguredLogger(
  collection: ServiceCollection,
  configure: ConfigureLoggerWithServices,
  options: UseConfiguredLoggerOptions = {},
): ServiceCollection {
  argumentNotNull(collection, "collection")
  argumentNotNull(configure, "configure")

  const { preserveGlobalLogger = false, writeToProviders = false } = options
  const providers = writeToProviders ? new LoggerProviderCollection() : undefined

  collection.addSingleton(REGISTERED_LOGGER, (services) => {
    const configuration = new LoggerConfiguration()
    if (providers) configuration.writeToProviders(providers)

    configure(services, configuration)

    return new RegisteredLogger(configuration.createLogger())
  })

  // A distinct object without `dispose`, so the container leaves it alone.
  collection.addSingleton(LOGGER, (services) =>
    services.getRequiredService(REGISTERED_LOGGER).logger.withEnricher(nullEnricher),
  )

  collection.addSingleton(LOGGER_FACTORY, (services) => {
    const { logger } = services.getRequiredService(REGISTERED_LOGGER)

    if (preserveGlobalLogger) {
      return createLoggerFactory(services, logger, true, providers)
    }

    globalLogger.set(logger)
    return createLoggerFactory(services, null, true, providers)
  })

  return collection
}
