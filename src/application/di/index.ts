/**
 * @module layered-app-kit/application/di
 * @description Service locator: registration, lifetimes and resolution
 */

// ============================================================================
// Contracts
// ============================================================================

export type {
  IServiceCollection,
  IServiceProvider,
  IServiceResolver,
  IServiceScope,
  IDisposable,
  ServiceDescriptor,
  ServiceFactory,
  ServiceRegistrationOptions,
  ServiceProviderOptions,
  ServiceToken,
  Constructor,
  AbstractConstructor,
} from './IDependencyInjection';

// ============================================================================
// Tokens, lifetimes, decorators
// ============================================================================

export {
  InjectionToken,
  createToken,
  isServiceToken,
  tokenName,
  ServiceLifetime,
  DEFAULT_REGISTRATION,
  Injectable,
  Inject,
  getConstructorDependencies,
  getDeclaredLifetime,
  isDisposable,
} from './IDependencyInjection';

// ============================================================================
// Errors
// ============================================================================

export {
  DependencyResolutionError,
  ServiceRegistrationError,
} from './IDependencyInjection';

// ============================================================================
// Implementations
// ============================================================================

export { ServiceCollection, createServiceCollection } from './ServiceCollection';
export type { DescriptorTable } from './ServiceCollection';
export { ServiceProvider } from './ServiceProvider';
