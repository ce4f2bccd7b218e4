/**
 * @fileoverview Service collection
 *
 * Configuration-phase registry. Registrations are collected here and frozen
 * into a {@link ServiceProvider} by {@link ServiceCollection.buildServiceProvider}.
 */

import {
  Constructor,
  DEFAULT_REGISTRATION,
  getConstructorDependencies,
  getDeclaredLifetime,
  IServiceCollection,
  IServiceProvider,
  ServiceDescriptor,
  ServiceFactory,
  ServiceLifetime,
  ServiceProviderOptions,
  ServiceRegistrationError,
  ServiceRegistrationOptions,
  ServiceToken,
  tokenName,
} from './IDependencyInjection';
import { ServiceProvider } from './ServiceProvider';

/**
 * Descriptors grouped by token, then by registration name.
 */
export type DescriptorTable = Map<
  ServiceToken<unknown>,
  Map<string, ServiceDescriptor<unknown>>
>;

export class ServiceCollection implements IServiceCollection {
  private readonly descriptors: DescriptorTable = new Map();

  register<T>(
    token: ServiceToken<T>,
    lifetime: ServiceLifetime,
    factory: ServiceFactory<T>,
    options: ServiceRegistrationOptions<T> = {},
  ): this {
    return this.add(
      {
        token,
        name: options.name,
        lifetime,
        factory,
        dependencies: options.dependsOn ?? [],
        ownsInstance: true,
        dispose: options.dispose,
      },
      options,
    );
  }

  addLazySingleton<T>(
    token: ServiceToken<T>,
    factory: ServiceFactory<T>,
    options?: ServiceRegistrationOptions<T>,
  ): this {
    return this.register(token, ServiceLifetime.LazySingleton, factory, options);
  }

  addFactory<T>(
    token: ServiceToken<T>,
    factory: ServiceFactory<T>,
    options?: ServiceRegistrationOptions<T>,
  ): this {
    return this.register(token, ServiceLifetime.Factory, factory, options);
  }

  addScoped<T>(
    token: ServiceToken<T>,
    factory: ServiceFactory<T>,
    options?: ServiceRegistrationOptions<T>,
  ): this {
    return this.register(token, ServiceLifetime.Scoped, factory, options);
  }

  addInstance<T>(
    token: ServiceToken<T>,
    instance: T,
    options: Pick<ServiceRegistrationOptions<T>, 'name' | 'tryAdd' | 'replace'> = {},
  ): this {
    return this.add(
      {
        token,
        name: options.name,
        lifetime: ServiceLifetime.LazySingleton,
        factory: () => instance,
        dependencies: [],
        ownsInstance: false,
      },
      options,
    );
  }

  addClass<T>(
    token: ServiceToken<T>,
    implementation: Constructor<T>,
    options: ServiceRegistrationOptions<T> & { lifetime?: ServiceLifetime } = {},
  ): this {
    const dependencies = getConstructorDependencies(implementation);
    const lifetime =
      options.lifetime ??
      getDeclaredLifetime(implementation) ??
      ServiceLifetime.LazySingleton;

    return this.add(
      {
        token,
        name: options.name,
        lifetime,
        factory: (resolver) =>
          new implementation(...dependencies.map((dep) => resolver.getService(dep))),
        dependencies,
        implementationType: implementation,
        ownsInstance: true,
        dispose: options.dispose,
      },
      options,
    );
  }

  isRegistered(token: ServiceToken<unknown>, name?: string): boolean {
    return this.descriptors.get(token)?.has(name ?? DEFAULT_REGISTRATION) ?? false;
  }

  getDescriptors(): readonly ServiceDescriptor[] {
    const all: ServiceDescriptor[] = [];
    for (const byName of this.descriptors.values()) {
      all.push(...byName.values());
    }
    return all;
  }

  remove(token: ServiceToken<unknown>, name?: string): boolean {
    const byName = this.descriptors.get(token);
    if (!byName) return false;

    const removed = byName.delete(name ?? DEFAULT_REGISTRATION);
    if (byName.size === 0) {
      this.descriptors.delete(token);
    }
    return removed;
  }

  buildServiceProvider(options: ServiceProviderOptions = {}): IServiceProvider {
    const snapshot: DescriptorTable = new Map();
    for (const [token, byName] of this.descriptors) {
      snapshot.set(token, new Map(byName));
    }

    const provider = new ServiceProvider(snapshot, options);
    if (options.validateOnBuild !== false) {
      provider.validate();
    }
    return provider;
  }

  private add<T>(
    descriptor: ServiceDescriptor<T>,
    options: { tryAdd?: boolean; replace?: boolean },
  ): this {
    const key = descriptor.name ?? DEFAULT_REGISTRATION;
    let byName = this.descriptors.get(descriptor.token);

    if (byName?.has(key)) {
      if (options.tryAdd) {
        return this;
      }
      if (!options.replace) {
        throw new ServiceRegistrationError(
          `Service '${tokenName(descriptor.token, descriptor.name)}' is already registered. ` +
            `Pass { replace: true } to override it or { tryAdd: true } to keep the first registration.`,
        );
      }
    }

    if (!byName) {
      byName = new Map();
      this.descriptors.set(descriptor.token, byName);
    }
    byName.set(key, descriptor);
    return this;
  }
}

export function createServiceCollection(): ServiceCollection {
  return new ServiceCollection();
}
