import { argumentNotNull } from "@tessera/errors"
import type { ServiceDescriptor, ServiceFactory } from "../ports/service-provider"
import type { ServiceToken } from "../ports/service-token"
import { ServiceProvider, type ServiceProviderOptions } from "./service-provider"

/**
 * Registration side of the container.
 *
 * Registering the same token twice keeps both descriptors:
 * `getRequiredService` resolves the last one, `getServices` all of them.
 */
export class ServiceCollection {
  private readonly descriptors: ServiceDescriptor[] = []

  /**
   * Registers a lazily built singleton. The factory runs on first
   * resolution, once per provider; if the result has a `dispose` method
   * the provider calls it on teardown.
   */
  addSingleton<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): this {
    argumentNotNull(token, "token")
    argumentNotNull(factory, "factory")

    this.descriptors.push({ token, lifetime: "singleton", factory })
    return this
  }

  /**
   * Registers a pre-built value. The provider never disposes it; whoever
   * built it keeps ownership.
   */
  addInstance<T>(token: ServiceToken<T>, instance: T): this {
    argumentNotNull(token, "token")

    this.descriptors.push({ token, lifetime: "instance", instance })
    return this
  }

  has<T>(token: ServiceToken<T>): boolean {
    return this.count(token) > 0
  }

  count<T>(token: ServiceToken<T>): number {
    return this.descriptors.filter((d) => d.token === token).length
  }

  /**
   * Snapshots the current registrations into a provider. Later
   * registrations do not affect providers that were already built.
   */
  buildServiceProvider(options: ServiceProviderOptions = {}): ServiceProvider {
    return new ServiceProvider([...this.descriptors], options)
  }
}
