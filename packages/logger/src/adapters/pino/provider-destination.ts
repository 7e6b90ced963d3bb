import type { DestinationStream } from "pino"
import { globalLogger } from "../../core/global-logger"
import type { LoggerProviderCollection } from "../../core/logger-provider-collection"
import type { LogMeta } from "../../ports/log-context"
import { levelNameFromSeverity } from "../../ports/log-level"
import type { LogRecord } from "../../ports/log-record"
import type { Logger } from "../../ports/logger"
import type { LoggerProvider } from "../../ports/logger-provider"

const DEFAULT_CATEGORY = "default"

// Fields pino adds to every line; they are not event properties.
const PINO_FIELDS = new Set(["level", "time", "msg", "pid", "hostname", "category"])

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

/**
 * Parses one serialized pino line. Returns `undefined` for anything that
 * is not a pino event.
 */
export function parseLogRecord(line: string): LogRecord | undefined {
  let payload: unknown
  try {
    payload = JSON.parse(line)
  } catch {
    return undefined
  }

  if (!isRecord(payload)) return undefined

  const { level: severity, msg, time, category } = payload
  if (typeof severity !== "number") return undefined

  const level = levelNameFromSeverity(severity)
  if (!level) return undefined

  const properties: LogMeta = {}
  for (const [key, value] of Object.entries(payload)) {
    if (!PINO_FIELDS.has(key)) properties[key] = value
  }

  return {
    level,
    message: typeof msg === "string" ? msg : "",
    ...(typeof category === "string" && { category }),
    properties,
    time: typeof time === "number" ? time : Date.now(),
  }
}

/**
 * A pino destination that forwards every event to the providers currently
 * in `providers`.
 *
 * A provider that throws does not stop the others; the failure is reported
 * through the global logger, and events raised while reporting are not
 * forwarded again.
 */
export function createProviderDestination(
  providers: LoggerProviderCollection,
): DestinationStream {
  const loggers = new Map<LoggerProvider, Map<string, Logger>>()
  let reporting = false

  const loggerFor = (provider: LoggerProvider, category: string): Logger => {
    let byCategory = loggers.get(provider)
    if (!byCategory) {
      byCategory = new Map()
      loggers.set(provider, byCategory)
    }

    let logger = byCategory.get(category)
    if (!logger) {
      logger = provider.createLogger(category)
      byCategory.set(category, logger)
    }

    return logger
  }

  return {
    write(line: string) {
      if (reporting || providers.size === 0) return

      const record = parseLogRecord(line)
      if (!record) return

      const category = record.category ?? DEFAULT_CATEGORY

      for (const provider of providers.providers) {
        try {
          loggerFor(provider, category)[record.level](record.message, record.properties)
        } catch (err) {
          reporting = true
          try {
            globalLogger.get().error("Log provider failed to write event", { err, category })
          } finally {
            reporting = false
          }
        }
      }
    },
  }
}
