import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import { renderTemplate } from "../../core/render-template"
import type { LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogEnricher } from "../../ports/log-enricher"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger, RootLogger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

/**
 * State shared by a root logger and everything derived from it.
 */
export type PinoPipeline = {
  closed: boolean
}

/**
 * Something the pipeline created itself and must release on dispose: a
 * transport stream, or the providers it forwards to.
 */
export type OwnedResource = {
  end(): void | Promise<void>
}

export type PinoLoggerDeps = {
  /**
   * Pino logger to write through (inherits its config). Context is kept by
   * this adapter and merged into each event, never bound on `base`.
   */
  base?: PinoLoggerBase

  /**
   * Optional destination stream for pino output.
   */
  destination?: DestinationStream

  pipeline?: PinoPipeline

  enrichers?: readonly LogEnricher[]
}

// Fields pino writes itself. Event properties never carry them.
const PINO_FIELDS = ["level", "time", "msg", "pid", "hostname"] as const

export class PinoLogger implements Logger {
  protected readonly logger: PinoLoggerBase
  protected readonly opts: Partial<LoggerOptions>
  protected readonly pipeline: PinoPipeline
  protected readonly enrichers: readonly LogEnricher[]
  protected readonly context: Record<string, unknown>

  constructor(
    deps: PinoLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.opts = opts
    this.pipeline = deps.pipeline ?? { closed: false }
    this.enrichers = deps.enrichers ?? []
    this.context = stripUndefined(context)
    this.logger = this.init(deps)
  }

  private init(deps: PinoLoggerDeps): PinoLoggerBase {
    if (deps.base) return deps.base

    const pinoOpts: PinoOptions = {
      level: this.opts.level ?? "info",
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        !deps.destination && {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "hostname",
            },
          },
        }),
    }

    return deps.destination ? pino(pinoOpts, deps.destination) : pino(pinoOpts)
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

  child(context: LogContextPatch): Logger {
    return new PinoLogger(this.derive(this.enrichers), this.opts, {
      ...this.context,
      ...stripUndefined(context),
    })
  }

  withEnricher(enricher: LogEnricher): Logger {
    return new PinoLogger(this.derive([...this.enrichers, enricher]), this.opts, this.context)
  }

  protected derive(enrichers: readonly LogEnricher[]): PinoLoggerDeps {
    return { base: this.logger, pipeline: this.pipeline, enrichers }
  }

  private write(level: LogLevelName, template: string, meta?: LogMeta): void {
    if (this.pipeline.closed) return
    if (!this.logger.isLevelEnabled(level)) return

    const properties: Record<string, unknown> = {}
    for (const enricher of this.enrichers) enricher.enrich(properties)
    Object.assign(properties, this.context)
    if (meta) Object.assign(properties, stripUndefined(meta))

    // The category belongs to the logger; per-call metadata cannot relabel it.
    if (this.context.category !== undefined) properties.category = this.context.category
    for (const key of PINO_FIELDS) delete properties[key]

    this.logger[level](properties, renderTemplate(template, properties))
  }
}

export type PinoRootLoggerDeps = PinoLoggerDeps & {
  owned?: readonly OwnedResource[]
}

/**
 * The logger that owns a pino pipeline.
 *
 * Loggers derived through `child` or `withEnricher` are plain
 * {@link PinoLogger}s: they write through this pipeline but cannot close it.
 */
export class PinoRootLogger extends PinoLogger implements RootLogger {
  private readonly owned: readonly OwnedResource[]

  constructor(
    deps: PinoRootLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    super(deps, opts, context)
    this.owned = deps.owned ?? []
  }

  get isClosed(): boolean {
    return this.pipeline.closed
  }

  async dispose(): Promise<void> {
    if (this.pipeline.closed) return
    this.pipeline.closed = true

    await new Promise<void>((resolve, reject) => {
      this.logger.flush((err) => (err ? reject(err) : resolve()))
    })

    for (const resource of this.owned) await resource.end()
  }
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}
