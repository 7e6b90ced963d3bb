/**
 * Adds or overrides properties on each event before it is written.
 *
 * Enrichers run in the order they were attached, before bound context
 * and per-call metadata are applied.
 */
export interface LogEnricher {
  enrich(properties: Record<string, unknown>): void
}

/**
 * Enricher that adds nothing.
 *
 * `root.withEnricher(nullEnricher)` yields a logger that writes through
 * the same pipeline as `root` but is a separate object without `dispose`.
 */
export const nullEnricher: LogEnricher = {
  enrich() {},
}

export function propertyEnricher(name: string, value: unknown): LogEnricher {
  return {
    enrich(properties) {
      properties[name] = value
    },
  }
}
