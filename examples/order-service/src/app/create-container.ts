import { createToken, ServiceCollection, type ServiceProvider } from "@tessera/container"
import { createConsoleLogger } from "@tessera/logger"
import {
  applyLoggerSettings,
  LOGGER_FACTORY,
  type LoggerSettings,
  loadLoggerSettings,
  useServiceConfiguredLogger,
} from "@tessera/logger-di"
import type { DestinationStream } from "pino"
import { OrderProcessor } from "../domains/orders/order-processor"

export const LOGGER_SETTINGS = createToken<LoggerSettings>("LoggerSettings")
export const ORDER_PROCESSOR = createToken<OrderProcessor>("OrderProcessor")

export type ContainerOptions = {
  env?: NodeJS.ProcessEnv
  /** Where JSON log lines go. Defaults to stdout unless pretty output is on. */
  destination?: DestinationStream
}

export function createServices(options: ContainerOptions = {}): ServiceCollection {
  const settings = loadLoggerSettings(options.env ?? process.env)
  const destination = options.destination ?? (settings.prettify ? undefined : process.stdout)

  const services = new ServiceCollection()
    .addInstance(LOGGER_SETTINGS, settings)
    .addSingleton(ORDER_PROCESSOR, (provider) =>
      new OrderProcessor(provider.getRequiredService(LOGGER_FACTORY)),
    )

  return useServiceConfiguredLogger(services, (provider, configuration) => {
    applyLoggerSettings(configuration, provider.getRequiredService(LOGGER_SETTINGS))
    if (destination) configuration.writeTo(destination)
  })
}

export function createContainer(options: ContainerOptions = {}): ServiceProvider {
  return createServices(options).buildServiceProvider({
    logger: createConsoleLogger({}, { level: "warn" }),
  })
}
