export {
  ConsoleLogger,
  type ConsoleLoggerDeps,
  ConsoleLoggerProvider,
  type ConsoleWriter,
  createConsoleLogger,
} from "./adapters/console/console-logger"
export {
  createMemoryDestination,
  type MemoryDestination,
} from "./adapters/memory/memory-destination"
export { NullLogger } from "./adapters/null/null-logger"
export {
  type OwnedResource,
  PinoLogger,
  type PinoLoggerDeps,
  type PinoPipeline,
  PinoRootLogger,
  type PinoRootLoggerDeps,
} from "./adapters/pino/pino-logger"
export { LoggerConfiguration, type SinkOptions } from "./adapters/pino/pino-logger-configuration"
export { PinoLoggerFactory } from "./adapters/pino/pino-logger-factory"
export { createProviderDestination, parseLogRecord } from "./adapters/pino/provider-destination"
export { globalLogger } from "./core/global-logger"
export {
  type AddProviderOptions,
  LoggerProviderCollection,
} from "./core/logger-provider-collection"
export { renderTemplate } from "./core/render-template"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export { type LogEnricher, nullEnricher, propertyEnricher } from "./ports/log-enricher"
export {
  isLogLevelName,
  LEVEL_SEVERITY,
  type LogLevel,
  type LogLevelName,
  LogLevels,
  levelNameFromSeverity,
  logLevelNames,
} from "./ports/log-level"
export type { LogRecord } from "./ports/log-record"
export { isRootLogger, type Logger, type RootLogger } from "./ports/logger"
export type { LoggerFactory } from "./ports/logger-factory"
export type { LoggerOptions } from "./ports/logger-options"
export type { LoggerProvider } from "./ports/logger-provider"
