import { createError } from "@tessera/errors"
import pino, { type DestinationStream } from "pino"
import type { LoggerProviderCollection } from "../../core/logger-provider-collection"
import { type LogEnricher, propertyEnricher } from "../../ports/log-enricher"
import type { LogLevelName } from "../../ports/log-level"
import type { RootLogger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"
import { type OwnedResource, PinoRootLogger } from "./pino-logger"
import { createProviderDestination } from "./provider-destination"

export type SinkOptions = {
  /** Minimum level for this sink. Defaults to the configuration's minimum level. */
  level?: LogLevelName
}

type SinkEntry = {
  create: () => { stream: DestinationStream; owned?: OwnedResource }
  level?: LogLevelName
}

/**
 * Builder for a pino-backed {@link RootLogger}.
 *
 * Sinks are created when {@link createLogger} runs, not when they are
 * added, so an unused configuration starts no transport.
 *
 * @example
 * ```ts
 * const logger = new LoggerConfiguration()
 *   .minimumLevel("debug")
 *   .enrichWithProperty("service", "orders")
 *   .writeTo(process.stdout)
 *   .createLogger()
 * ```
 */
export class LoggerConfiguration {
  private level: LogLevelName = "info"
  private readonly sinks: SinkEntry[] = []
  private readonly enrichers: LogEnricher[] = []
  private created = false

  minimumLevel(level: LogLevelName): this {
    this.level = level
    return this
  }

  writeTo(destination: DestinationStream, options: SinkOptions = {}): this {
    this.sinks.push({ create: () => ({ stream: destination }), level: options.level })
    return this
  }

  writeToPretty(options: SinkOptions = {}): this {
    this.sinks.push({
      create: () => {
        const stream = pino.transport({
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
        })
        return {
          stream,
          owned: {
            end: () => {
              stream.end()
            },
          },
        }
      },
      level: options.level,
    })
    return this
  }

  /**
   * Forwards events to every provider in `providers`, including providers
   * added after the logger is created. Disposing the logger disposes the
   * collection.
   */
  writeToProviders(providers: LoggerProviderCollection, options: SinkOptions = {}): this {
    this.sinks.push({
      create: () => ({
        stream: createProviderDestination(providers),
        owned: { end: () => providers.dispose() },
      }),
      level: options.level,
    })
    return this
  }

  enrichWith(enricher: LogEnricher): this {
    this.enrichers.push(enricher)
    return this
  }

  enrichWithProperty(name: string, value: unknown): this {
    return this.enrichWith(propertyEnricher(name, value))
  }

  readFrom(options: Partial<LoggerOptions>): this {
    if (options.level) this.minimumLevel(options.level)
    if (options.prettify) this.writeToPretty()
    return this
  }

  createLogger(): RootLogger {
    if (this.created) {
      throw createError(
        "logger_already_created",
        "createLogger() can only be called once per LoggerConfiguration",
      )
    }
    this.created = true

    const owned: OwnedResource[] = []
    const streams = this.sinks.map((sink) => {
      const { stream, owned: sinkOwned } = sink.create()
      if (sinkOwned) owned.push(sinkOwned)

      return { stream, level: sink.level ?? this.level }
    })

    return new PinoRootLogger(
      {
        destination: pino.multistream(streams),
        enrichers: [...this.enrichers],
        owned,
      },
      { level: this.level },
    )
  }
}
