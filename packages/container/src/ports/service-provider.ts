import type { ServiceToken } from "./service-token"

/**
 * Resolves services registered in a service collection.
 */
export interface IServiceProvider {
  /** The last registration for `token`, or `undefined` if there is none. */
  getService<T>(token: ServiceToken<T>): T | undefined

  /** Like {@link getService}, but throws `service_not_registered` instead. */
  getRequiredService<T>(token: ServiceToken<T>): T

  /** Every registration for `token`, in registration order. */
  getServices<T>(token: ServiceToken<T>): T[]
}

export type ServiceFactory<T> = (services: IServiceProvider) => T

export type ServiceDescriptor<T = unknown> =
  | {
      readonly token: ServiceToken<T>
      readonly lifetime: "singleton"
      readonly factory: ServiceFactory<T>
    }
  | {
      readonly token: ServiceToken<T>
      readonly lifetime: "instance"
      readonly instance: T
    }
