import type { DestinationStream } from "pino"

/**
 * In-memory pino destination. Each written line is parsed and kept in
 * `entries`.
 */
export type MemoryDestination = DestinationStream & {
  readonly entries: readonly Record<string, unknown>[]
  clear(): void
}

export function createMemoryDestination(): MemoryDestination {
  const entries: Record<string, unknown>[] = []

  return {
    entries,
    write(line: string) {
      const trimmed = line.trim()
      if (trimmed) entries.push(JSON.parse(trimmed))
    },
    clear() {
      entries.length = 0
    },
  }
}
