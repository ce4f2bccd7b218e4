/**
 * @fileoverview Dependency Injection Contracts
 *
 * @packageDocumentation
 * @module layered-app-kit/application/di
 *
 * ## Architectural Layer: APPLICATION
 *
 * This file declares the service-locator contracts used to wire an
 * application at process start:
 *
 * - ✅ **CAN**: Bind contracts (tokens) to factories or classes
 * - ✅ **CAN**: Manage instance lifetimes and scopes
 * - ✅ **CAN**: Report configuration mistakes before the first screen runs
 * - ❌ **CANNOT**: Be looked up from inside constructors (dependencies are
 *   passed in, never fetched from a global registry)
 *
 * ## Registration vs. Resolution
 *
 * ```
 * 1. Configuration phase (start-up)
 *    services.addLazySingleton(ARTICLE_REPOSITORY, (r) => new ArticleRepositoryImpl(...))
 *    services.addFactory(ArticleController, (r) => new ArticleController(...))
 *        ↓
 * 2. Build + validate
 *    const provider = services.buildServiceProvider();  // throws on missing contracts
 *        ↓
 * 3. Resolution phase (runtime)
 *    provider.getService(ArticleController)
 * ```
 *
 * ## Lifetimes
 *
 * ### LazySingleton
 *
 * ```
 * getService(Repo) → Repo (instance-1)   ← constructed on first lookup
 * getService(Repo) → Repo (instance-1)   ← same instance
 * ```
 *
 * Repositories, data sources, HTTP clients, use cases.
 *
 * ### Factory
 *
 * ```
 * getService(Controller) → Controller (instance-1)
 * getService(Controller) → Controller (instance-2)   ← new every lookup
 * ```
 *
 * Per-screen controllers and anything else that holds screen state.
 *
 * ### Scoped
 *
 * ```
 * scope-1: getService(Session) → Session (instance-1)
 * scope-1: getService(Session) → Session (instance-1)
 * scope-2: getService(Session) → Session (instance-2)
 * ```
 *
 * One instance per {@link IServiceScope}, disposed with the scope.
 *
 * **Valid lifetime dependencies:**
 * - ✅ LazySingleton can depend on: LazySingleton, Factory
 * - ✅ Scoped can depend on: LazySingleton, Scoped, Factory
 * - ✅ Factory can depend on: anything
 * - ❌ LazySingleton cannot depend on: Scoped
 *
 * ## Error Scenarios
 *
 * Every configuration error is a {@link DependencyResolutionError} carrying a
 * rendering of the dependency path that led to it:
 *
 * ```
 * ├─ ArticleController (Factory)
 *   └─ GetArticle (LazySingleton)
 *     └─ ArticleRepository (UNREGISTERED)
 * ```
 */

import 'reflect-metadata';

import type { ILogger } from '../logging/ILogger';

// ============================================================================
// Tokens
// ============================================================================

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T> = new (...args: any[]) => T;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T> = abstract new (...args: any[]) => T;

/**
 * Token for a contract that has no runtime representation (an interface).
 *
 * @example
 * ```typescript
 * export interface ArticleRepository { ... }
 * export const ARTICLE_REPOSITORY = createToken<ArticleRepository>('ArticleRepository');
 * ```
 */
export class InjectionToken<T> {
  /** Carries `T` for type inference only; never set. */
  declare readonly __type?: T;

  constructor(public readonly description: string) {}

  toString(): string {
    return `InjectionToken(${this.description})`;
  }
}

/**
 * Key under which a contract is registered: a token or a class.
 */
export type ServiceToken<T> = InjectionToken<T> | AbstractConstructor<T>;

/**
 * Registration name used when none is given.
 */
export const DEFAULT_REGISTRATION = '';

export function createToken<T>(description: string): InjectionToken<T> {
  return new InjectionToken<T>(description);
}

export function isServiceToken(value: unknown): value is ServiceToken<unknown> {
  return value instanceof InjectionToken || typeof value === 'function';
}

/**
 * Human-readable name of a token, used in error messages and graphs.
 */
export function tokenName(token: ServiceToken<unknown>, name?: string): string {
  const base = token instanceof InjectionToken ? token.description : token.name;
  return name ? `${base}[${name}]` : base;
}

// ============================================================================
// Lifetimes
// ============================================================================

export enum ServiceLifetime {
  /** Constructed once, on first lookup, and shared for the provider's lifetime. */
  LazySingleton = 'LazySingleton',

  /** Constructed on every lookup. */
  Factory = 'Factory',

  /** Constructed once per scope and disposed with it. */
  Scoped = 'Scoped',
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown when a contract cannot be resolved: it is unregistered, part of a
 * cycle, captured by a longer-lived service, or its factory failed.
 */
export class DependencyResolutionError extends Error {
  /**
   * Rendering of the dependency path leading to the failure.
   *
   * ```
   * ├─ ServiceA (LazySingleton)
   *   └─ ServiceB (LazySingleton)
   *     └─ ServiceA (CIRCULAR!)
   * ```
   */
  public readonly dependencyGraph: string;

  constructor(message: string, dependencyGraph: string = '', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DependencyResolutionError';
    this.dependencyGraph = dependencyGraph;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, DependencyResolutionError.prototype);
  }
}

/**
 * Thrown while registering: duplicate registrations, or a class whose
 * constructor dependencies cannot be determined.
 */
export class ServiceRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServiceRegistrationError';
    Object.setPrototypeOf(this, ServiceRegistrationError.prototype);
  }
}

// ============================================================================
// Registration
// ============================================================================

/**
 * The part of a provider handed to factories.
 *
 * @remarks
 * Factories resolve their dependencies through this resolver and pass them
 * into constructors. The resolver tracks the current resolution path, so
 * cycles and lifetime mismatches are detected across factories.
 */
export interface IServiceResolver {
  getService<T>(token: ServiceToken<T>, name?: string): T;

  tryGetService<T>(token: ServiceToken<T>, name?: string): T | undefined;

  isRegistered(token: ServiceToken<unknown>, name?: string): boolean;
}

/**
 * Factory function for creating service instances.
 *
 * @example Conditional construction
 * ```typescript
 * services.addLazySingleton(HTTP_CLIENT, (r) => {
 *   const config = r.getService(APP_CONFIG);
 *   return new FetchHttpClient({ baseUrl: config.apiUrl });
 * });
 * ```
 */
export type ServiceFactory<T> = (resolver: IServiceResolver) => T;

/**
 * Additional options for service registration.
 */
export interface ServiceRegistrationOptions<T = unknown> {
  /**
   * Named registration, for several implementations of one contract.
   *
   * @example
   * ```typescript
   * services.addLazySingleton(KEY_VALUE_STORE, () => new MemoryKeyValueStore(), { name: 'articles' });
   * provider.getService(KEY_VALUE_STORE, 'articles');
   * ```
   */
  name?: string;

  /** Skip silently if the contract is already registered. */
  tryAdd?: boolean;

  /** Replace an existing registration instead of failing. */
  replace?: boolean;

  /**
   * Contracts the factory resolves, checked by `validate()` at start-up.
   * Class registrations derive this from constructor metadata.
   */
  dependsOn?: readonly ServiceToken<unknown>[];

  /** Custom disposal; defaults to calling the instance's own `dispose()`. */
  dispose?(instance: T): void | Promise<void>;
}

/**
 * Descriptor for a registered service.
 */
export interface ServiceDescriptor<T = unknown> {
  readonly token: ServiceToken<T>;

  readonly name?: string;

  readonly lifetime: ServiceLifetime;

  readonly factory: ServiceFactory<T>;

  readonly dependencies: readonly ServiceToken<unknown>[];

  /** Present for `addClass` registrations. */
  readonly implementationType?: Constructor<T>;

  /** False for `addInstance`: the container did not create it, so it does not dispose it. */
  readonly ownsInstance: boolean;

  dispose?(instance: T): void | Promise<void>;
}

export interface ServiceProviderOptions {
  /** Run `validate()` while building; default true. */
  validateOnBuild?: boolean;

  logger?: ILogger;
}

/**
 * Interface for registering services.
 */
export interface IServiceCollection {
  register<T>(
    token: ServiceToken<T>,
    lifetime: ServiceLifetime,
    factory: ServiceFactory<T>,
    options?: ServiceRegistrationOptions<T>,
  ): this;

  addLazySingleton<T>(
    token: ServiceToken<T>,
    factory: ServiceFactory<T>,
    options?: ServiceRegistrationOptions<T>,
  ): this;

  addFactory<T>(
    token: ServiceToken<T>,
    factory: ServiceFactory<T>,
    options?: ServiceRegistrationOptions<T>,
  ): this;

  addScoped<T>(
    token: ServiceToken<T>,
    factory: ServiceFactory<T>,
    options?: ServiceRegistrationOptions<T>,
  ): this;

  /** Register an existing value. The container never disposes it. */
  addInstance<T>(
    token: ServiceToken<T>,
    instance: T,
    options?: Pick<ServiceRegistrationOptions<T>, 'name' | 'tryAdd' | 'replace'>,
  ): this;

  /**
   * Register a class, injecting its constructor parameters from
   * {@link Inject} metadata (or emitted parameter types).
   */
  addClass<T>(
    token: ServiceToken<T>,
    implementation: Constructor<T>,
    options?: ServiceRegistrationOptions<T> & { lifetime?: ServiceLifetime },
  ): this;

  isRegistered(token: ServiceToken<unknown>, name?: string): boolean;

  getDescriptors(): readonly ServiceDescriptor[];

  remove(token: ServiceToken<unknown>, name?: string): boolean;

  buildServiceProvider(options?: ServiceProviderOptions): IServiceProvider;
}

/**
 * Interface for resolving services.
 */
export interface IServiceProvider extends IServiceResolver {
  /**
   * Create a scope with its own Scoped instances.
   */
  createScope(): IServiceScope;

  /**
   * Walk every registration's declared dependencies and throw the first
   * unregistered contract, cycle or lifetime mismatch found.
   *
   * @throws DependencyResolutionError
   */
  validate(): void;

  /**
   * Dispose every instance this provider created, newest first.
   */
  dispose(): Promise<void>;
}

/**
 * A resolution scope.
 */
export interface IServiceScope {
  getServiceProvider(): IServiceResolver;

  /** Dispose the scope's Scoped instances. */
  dispose(): Promise<void>;
}

/**
 * Disposable service
 */
export interface IDisposable {
  dispose(): void | Promise<void>;
}

export function isDisposable(value: unknown): value is IDisposable {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'dispose') === 'function'
  );
}

// ============================================================================
// Decorators
// ============================================================================

const LIFETIME_METADATA = 'layerkit:lifetime';
const INJECT_METADATA = 'layerkit:inject';

/**
 * Marks a class for {@link IServiceCollection.addClass} and sets its default lifetime.
 *
 * @example
 * ```typescript
 * @Injectable({ lifetime: ServiceLifetime.Factory })
 * class ArticleController extends Controller {
 *   constructor(@Inject(GetArticle) private readonly getArticle: GetArticle) {
 *     super();
 *   }
 * }
 * ```
 */
export function Injectable(
  options: { lifetime: ServiceLifetime } = { lifetime: ServiceLifetime.LazySingleton },
): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(LIFETIME_METADATA, options.lifetime, target);
  };
}

/**
 * Declares the contract injected into a constructor parameter.
 *
 * Required for interface contracts, whose emitted parameter type is `Object`.
 */
export function Inject<T>(token: ServiceToken<T>): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existing: unknown = Reflect.getOwnMetadata(INJECT_METADATA, target);
    const tokens: unknown[] = Array.isArray(existing) ? [...existing] : [];
    tokens[parameterIndex] = token;
    Reflect.defineMetadata(INJECT_METADATA, tokens, target);
  };
}

const NON_INJECTABLE_TYPES = new Set<unknown>([
  Object,
  String,
  Number,
  Boolean,
  Array,
  Function,
  Symbol,
]);

/**
 * Lifetime declared with {@link Injectable}, if any.
 */
export function getDeclaredLifetime(target: Constructor<unknown>): ServiceLifetime | undefined {
  const lifetime: unknown = Reflect.getOwnMetadata(LIFETIME_METADATA, target);
  return Object.values(ServiceLifetime).find((value) => value === lifetime);
}

/**
 * Constructor dependencies of a class, from {@link Inject} tokens first and
 * emitted `design:paramtypes` second.
 *
 * @throws ServiceRegistrationError when a parameter's contract cannot be determined
 */
export function getConstructorDependencies(
  target: Constructor<unknown>,
): ServiceToken<unknown>[] {
  const injected: unknown = Reflect.getOwnMetadata(INJECT_METADATA, target);
  const designTypes: unknown = Reflect.getOwnMetadata('design:paramtypes', target);
  const explicit: unknown[] = Array.isArray(injected) ? injected : [];
  const emitted: unknown[] = Array.isArray(designTypes) ? designTypes : [];
  const count = Math.max(target.length, explicit.length, emitted.length);

  const dependencies: ServiceToken<unknown>[] = [];
  for (let index = 0; index < count; index++) {
    const candidate = explicit[index] ?? emitted[index];
    if (!isServiceToken(candidate) || NON_INJECTABLE_TYPES.has(candidate)) {
      throw new ServiceRegistrationError(
        `Cannot determine constructor parameter #${index} of '${target.name}'. ` +
          `Annotate it with @Inject(token).`,
      );
    }
    dependencies.push(candidate);
  }
  return dependencies;
}
