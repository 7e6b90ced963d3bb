import { renderTemplate } from "../../core/render-template"
import type { LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogEnricher } from "../../ports/log-enricher"
import { LEVEL_SEVERITY, type LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"
import type { LoggerProvider } from "../../ports/logger-provider"

export type ConsoleWriter = Pick<Console, "trace" | "debug" | "info" | "warn" | "error">

export type ConsoleLoggerDeps = {
  console?: ConsoleWriter
}

type ConsoleMethod = "trace" | "debug" | "info" | "warn" | "error"

const LEVEL_TO_CONSOLE_METHOD: Record<LogLevelName, ConsoleMethod> = {
  trace: "trace",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
  fatal: "error",
}

const RESERVED_KEYS = ["timestamp", "level", "message"] as const

export class ConsoleLogger implements Logger {
  private readonly sink: ConsoleWriter
  private readonly opts: Partial<LoggerOptions>
  private readonly context: LogContextPatch

  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
    private readonly enrichers: readonly LogEnricher[] = [],
  ) {
    this.sink = deps.console ?? globalThis.console
    this.opts = opts
    this.context = stripUndefined(context)
  }

  child(context: LogContextPatch): Logger {
    return new ConsoleLogger(
      this.deps,
      this.opts,
      { ...this.context, ...stripUndefined(context) },
      this.enrichers,
    )
  }

  withEnricher(enricher: LogEnricher): Logger {
    return new ConsoleLogger(this.deps, this.opts, this.context, [
      ...this.enrichers,
      enricher,
    ])
  }

  trace(message: string, meta?: LogMeta): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta): void {
    this.write("fatal", message, meta)
  }

  private shouldLog(level: LogLevelName): boolean {
    const min = this.opts.level ?? "info"
    return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[min]
  }

  private write(level: LogLevelName, template: string, meta?: LogMeta) {
    if (!this.shouldLog(level)) return

    const enriched: Record<string, unknown> = {}
    for (const enricher of this.enrichers) enricher.enrich(enriched)

    const properties = stripUndefined({ ...enriched, ...this.context, ...meta })
    for (const key of RESERVED_KEYS) delete properties[key]

    const payload: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message: renderTemplate(template, properties),
      ...properties,
    }

    if ("err" in payload) {
      payload.err = normalizeError(payload.err)
    }

    const output = this.opts.prettify ? formatPretty(payload) : safeStringify(payload)

    this.sink[LEVEL_TO_CONSOLE_METHOD[level]](output)
  }
}

/**
 * Secondary provider writing to the console, one `ConsoleLogger` per
 * category.
 */
export class ConsoleLoggerProvider implements LoggerProvider {
  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
  ) {}

  createLogger(category: string): Logger {
    return new ConsoleLogger(this.deps, this.opts, { category })
  }
}

function normalizeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err

  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
    cause: err.cause,
  }
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    return JSON.stringify({ message: "Failed to stringify log payload" })
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null
}

function formatPretty(payload: Record<string, unknown>): string {
  const { timestamp, level, message, err, ...rest } = payload

  const stack = isRecord(err) && typeof err.stack === "string" ? err.stack : undefined

  if (isRecord(err) && stack) {
    const { stack: _, ...errWithoutStack } = err
    rest.err = errWithoutStack
  } else if (err !== undefined) {
    rest.err = err
  }

  const tail = Object.keys(rest).length ? ` ${safeStringify(rest)}` : ""
  const line = `${String(timestamp)} ${String(level).toUpperCase()} ${String(message)}${tail}`

  if (!stack) return line

  const indentedStack = stack
    .split("\n")
    .map((l) => `  ${l}`)
    .join("\n")

  return `${line}\n${indentedStack}`
}

export function createConsoleLogger(
  deps: ConsoleLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
): Logger {
  return new ConsoleLogger(deps, opts)
}
