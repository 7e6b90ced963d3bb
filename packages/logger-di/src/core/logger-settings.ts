import { createError, type ErrorContext } from "@tessera/errors"
import { type LoggerConfiguration, type LogLevelName, logLevelNames } from "@tessera/logger"
import { z } from "zod"

const booleanish = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

const loggerSettingsSchema = z.object({
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: booleanish.default(false),
  SERVICE_NAME: z.string().min(1).optional(),
  APP_ENV: z.string().min(1).default("development"),
})

export type LoggerSettings = {
  level: LogLevelName
  prettify: boolean
  serviceName?: string
  env: string
}

export type LoggerSettingsIssue = { path: string; message: string }

export type InvalidLoggerSettingsContext = ErrorContext & {
  issues: LoggerSettingsIssue[]
}

/**
 * Reads logger settings from environment variables:
 *
 * | Variable       | Values                        | Default       |
 * | -------------- | ----------------------------- | ------------- |
 * | `LOG_LEVEL`    | `trace` … `fatal`             | `info`        |
 * | `LOG_PRETTY`   | `true`, `false`, `1`, `0`     | `false`       |
 * | `SERVICE_NAME` | non-empty string              | none          |
 * | `APP_ENV`      | non-empty string              | `development` |
 *
 * @throws BaseError `invalid_logger_settings`, with every problem listed in
 *   `context.issues`
 */
export function loadLoggerSettings(
  env: Record<string, string | undefined> = process.env,
): LoggerSettings {
  const result = loggerSettingsSchema.safeParse(env)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))

    throw createError(
      "invalid_logger_settings",
      `Invalid logger settings: ${issues.map((i) => i.path).join(", ")}`,
      { context: { issues } satisfies InvalidLoggerSettingsContext },
    )
  }

  const { LOG_LEVEL, LOG_PRETTY, SERVICE_NAME, APP_ENV } = result.data

  return {
    level: LOG_LEVEL,
    prettify: LOG_PRETTY,
    ...(SERVICE_NAME !== undefined && { serviceName: SERVICE_NAME }),
    env: APP_ENV,
  }
}

/**
 * Applies `settings` to a logger configuration: level and pretty output,
 * plus `service` and `env` properties on every event.
 */
export function applyLoggerSettings(
  configuration: LoggerConfiguration,
  settings: LoggerSettings,
): LoggerConfiguration {
  configuration.readFrom({ level: settings.level, prettify: settings.prettify })

  if (settings.serviceName !== undefined) {
    configuration.enrichWithProperty("service", settings.serviceName)
  }

  return configuration.enrichWithProperty("env", settings.env)
}
