import { createError } from "@tessera/errors"
import { type Logger, NullLogger } from "@tessera/logger"
import type { IServiceProvider, ServiceDescriptor } from "../ports/service-provider"
import type { ServiceToken } from "../ports/service-token"
import { isDisposable } from "./is-disposable"

export type ServiceProviderOptions = {
  /** Receives disposal diagnostics. Defaults to a no-op logger. */
  logger?: Logger
}

type Registration<T> = {
  readonly descriptor: ServiceDescriptor<T>
  built?: { value: T }
}

type CreatedService = {
  readonly token: ServiceToken<unknown>
  readonly value: unknown
}

export class ServiceProvider implements IServiceProvider {
  private readonly registrations = new Map<ServiceToken<unknown>, Registration<unknown>[]>()
  private readonly resolving = new Set<Registration<unknown>>()
  private readonly created: CreatedService[] = []
  private readonly logger: Logger
  private disposed = false

  constructor(descriptors: readonly ServiceDescriptor[], options: ServiceProviderOptions = {}) {
    this.logger = options.logger ?? new NullLogger()

    for (const descriptor of descriptors) {
      const existing = this.registrations.get(descriptor.token)
      if (existing) existing.push({ descriptor })
      else this.registrations.set(descriptor.token, [{ descriptor }])
    }
  }

  getService<T>(token: ServiceToken<T>): T | undefined {
    const registrations = this.registrationsFor(token)
    const last = registrations[registrations.length - 1]

    return last ? this.resolve(last) : undefined
  }

  getRequiredService<T>(token: ServiceToken<T>): T {
    const registrations = this.registrationsFor(token)
    const last = registrations[registrations.length - 1]

    if (!last) {
      throw createError(
        "service_not_registered",
        `No service registered for ${token.description}`,
        { context: { service: token.description }, isOperational: false },
      )
    }

    return this.resolve(last)
  }

  getServices<T>(token: ServiceToken<T>): T[] {
    return this.registrationsFor(token).map((r) => this.resolve(r))
  }

  /**
   * Disposes every singleton this provider built that has a `dispose`
   * method, newest first. Instances registered with `addInstance` are left
   * alone. A failing disposal does not stop the others.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return
    this.disposed = true

    const failures: unknown[] = []

    for (const { token, value } of [...this.created].reverse()) {
      if (!isDisposable(value)) continue

      this.logger.debug("Disposing service", { service: token.description })

      try {
        await value.dispose()
      } catch (err) {
        failures.push(err)
        this.logger.error("Service disposal failed", { service: token.description, err })
      }
    }

    if (failures.length > 0) {
      throw createError(
        "service_disposal_failed",
        `${failures.length} service(s) failed to dispose`,
        {
          context: { failures: failures.length },
          cause: new AggregateError(failures, "Service disposal failed"),
        },
      )
    }
  }

  private registrationsFor<T>(token: ServiceToken<T>): Registration<T>[] {
    if (this.disposed) {
      throw createError("container_disposed", "Cannot resolve services from a disposed provider", {
        context: { service: token.description },
        isOperational: false,
      })
    }

    // Registrations are keyed by the token they were added under.
    return (this.registrations.get(token) ?? []) as Registration<T>[]
  }

  private resolve<T>(registration: Registration<T>): T {
    const { descriptor } = registration

    if (descriptor.lifetime === "instance") return descriptor.instance
    if (registration.built) return registration.built.value

    if (this.resolving.has(registration)) {
      throw createError(
        "circular_dependency",
        `Circular dependency while resolving ${descriptor.token.description}`,
        { context: { service: descriptor.token.description }, isOperational: false },
      )
    }

    this.resolving.add(registration)
    try {
      const value = descriptor.factory(this)
      registration.built = { value }
      this.created.push({ token: descriptor.token, value })

      return value
    } finally {
      this.resolving.delete(registration)
    }
  }
}
