import type { LogMeta } from "./log-context"
import type { LogLevelName } from "./log-level"

/**
 * A single event as seen by a secondary provider: the rendered message plus
 * the structured properties it was rendered from.
 */
export type LogRecord = {
  level: LogLevelName
  message: string
  category?: string
  properties: LogMeta
  /** Epoch milliseconds */
  time: number
}
