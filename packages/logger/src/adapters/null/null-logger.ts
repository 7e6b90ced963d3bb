import type { LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogEnricher } from "../../ports/log-enricher"
import type { Logger } from "../../ports/logger"

export class NullLogger implements Logger {
  trace(_message: string, _meta?: LogMeta): void {}

  debug(_message: string, _meta?: LogMeta): void {}

  info(_message: string, _meta?: LogMeta): void {}

  warn(_message: string, _meta?: LogMeta): void {}

  error(_message: string, _meta?: LogMeta): void {}

  fatal(_message: string, _meta?: LogMeta): void {}

  child(_context: LogContextPatch): Logger {
    return new NullLogger()
  }

  withEnricher(_enricher: LogEnricher): Logger {
    return new NullLogger()
  }
}
