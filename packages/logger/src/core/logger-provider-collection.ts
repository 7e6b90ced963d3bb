import { createError } from "@tessera/errors"
import type { LoggerProvider } from "../ports/logger-provider"

export type AddProviderOptions = {
  /**
   * Whether disposing the collection disposes this provider. Pass `false`
   * for providers another owner (such as a DI container) disposes.
   * Defaults to `true`.
   */
  owned?: boolean
}

/**
 * Ordered set of secondary providers a pipeline forwards events to.
 *
 * The pipeline reads the collection on every event, so providers added
 * after the logger was created still receive subsequent events.
 */
export class LoggerProviderCollection {
  private readonly items: LoggerProvider[] = []
  private readonly owned = new Set<LoggerProvider>()
  private readonly disposed = new Set<LoggerProvider>()

  add(provider: LoggerProvider, options: AddProviderOptions = {}): void {
    if (this.items.includes(provider)) return

    this.items.push(provider)
    if (options.owned ?? true) this.owned.add(provider)
  }

  get providers(): readonly LoggerProvider[] {
    return this.items
  }

  get size(): number {
    return this.items.length
  }

  /**
   * Disposes each owned provider once, in insertion order. Safe to call
   * again; providers already disposed are skipped. A failing provider does
   * not stop the others.
   */
  async dispose(): Promise<void> {
    const failures: unknown[] = []

    for (const provider of this.items) {
      if (!this.owned.has(provider) || this.disposed.has(provider)) continue
      this.disposed.add(provider)

      try {
        await provider.dispose?.()
      } catch (err) {
        failures.push(err)
      }
    }

    if (failures.length > 0) {
      throw createError(
        "provider_disposal_failed",
        `${failures.length} logger provider(s) failed to dispose`,
        { cause: new AggregateError(failures, "Logger provider disposal failed") },
      )
    }
  }
}
