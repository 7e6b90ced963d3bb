export {
  applyLoggerSettings,
  type InvalidLoggerSettingsContext,
  type LoggerSettings,
  type LoggerSettingsIssue,
  loadLoggerSettings,
} from "./core/logger-settings"
export { RegisteredLogger } from "./core/registered-logger"
export { LOGGER, LOGGER_FACTORY, LOGGER_PROVIDER, REGISTERED_LOGGER } from "./core/tokens"
export {
  type ConfigureLogger,
  type ConfigureLoggerWithServices,
  type UseConfiguredLoggerOptions,
  useConfiguredLogger,
  useServiceConfiguredLogger,
} from "./core/use-configured-logger"
export { type UseLoggerOptions, useLogger } from "./core/use-logger"
