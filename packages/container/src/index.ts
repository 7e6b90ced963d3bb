export { type DisposableService, isDisposable } from "./core/is-disposable"
export { ServiceCollection } from "./core/service-collection"
export { ServiceProvider, type ServiceProviderOptions } from "./core/service-provider"
export type {
  IServiceProvider,
  ServiceDescriptor,
  ServiceFactory,
} from "./ports/service-provider"
export { createToken, ServiceToken } from "./ports/service-token"
