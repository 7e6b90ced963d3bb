/**
 * Typed key for a service registration.
 *
 * Tokens compare by identity, so two tokens with the same description are
 * different services.
 */
export class ServiceToken<T> {
  declare readonly __service?: T

  constructor(readonly description: string) {}

  toString(): string {
    return `ServiceToken(${this.description})`
  }
}

export function createToken<T>(description: string): ServiceToken<T> {
  return new ServiceToken<T>(description)
}
