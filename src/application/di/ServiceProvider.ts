/**
 * @fileoverview Service provider
 *
 * Resolves registrations built by {@link ServiceCollection}. Resolution is
 * synchronous; the current dependency path travels with each call so that
 * cycles, lifetime mismatches and missing registrations are reported with
 * the chain that led to them.
 */

import { consoleLogger, ILogger } from '../logging/ILogger';
import {
  DEFAULT_REGISTRATION,
  DependencyResolutionError,
  isDisposable,
  IServiceProvider,
  IServiceResolver,
  IServiceScope,
  ServiceDescriptor,
  ServiceLifetime,
  ServiceProviderOptions,
  ServiceToken,
  tokenName,
} from './IDependencyInjection';
import type { DescriptorTable } from './ServiceCollection';

type Disposal = () => void | Promise<void>;

/** @internal */
export interface Entry<T> {
  readonly descriptor: ServiceDescriptor<T>;
  singleton?: { readonly value: T };
  readonly scoped: WeakMap<ScopeState, { readonly value: T }>;
}

/** @internal */
export interface Frame {
  readonly entry: Entry<unknown>;
  readonly label: string;
}

/** @internal */
export interface ScopeState {
  readonly disposals: Disposal[];
  disposed: boolean;
}

// ============================================================================
// Dependency graph rendering
// ============================================================================

function renderGraph(path: readonly Frame[], current: string): string {
  let graph = '';
  for (let i = 0; i < path.length; i++) {
    const indent = '  '.repeat(i);
    const branch = i === path.length - 1 ? '└─' : '├─';
    graph += `${indent}${branch} ${path[i].label} (${path[i].entry.descriptor.lifetime})\n`;
  }
  graph += `${'  '.repeat(path.length)}└─ ${current}\n`;
  return graph;
}

function unregisteredError(label: string, path: readonly Frame[]): DependencyResolutionError {
  const requiredBy = path.length > 0 ? ` required by '${path[path.length - 1].label}'` : '';
  return new DependencyResolutionError(
    `Service '${label}'${requiredBy} is not registered`,
    renderGraph(path, `${label} (UNREGISTERED)`),
  );
}

function circularError(label: string, path: readonly Frame[]): DependencyResolutionError {
  const chain = [...path.map((frame) => frame.label), label].join(' → ');
  return new DependencyResolutionError(
    `Circular dependency detected: ${chain}`,
    renderGraph(path, `${label} (CIRCULAR!)`),
  );
}

function scopeMismatchError(
  owner: Frame,
  label: string,
  path: readonly Frame[],
): DependencyResolutionError {
  return new DependencyResolutionError(
    `Scope mismatch: LazySingleton '${owner.label}' cannot depend on Scoped '${label}'`,
    renderGraph(path, `${label} (Scoped) ← SCOPE MISMATCH`),
  );
}

function singletonOwner(path: readonly Frame[]): Frame | undefined {
  return path.find(
    (frame) => frame.entry.descriptor.lifetime === ServiceLifetime.LazySingleton,
  );
}

async function runDisposals(disposals: Disposal[]): Promise<void> {
  const errors: unknown[] = [];
  const pending = disposals.splice(0, disposals.length).reverse();

  for (const disposal of pending) {
    try {
      await disposal();
    } catch (error) {
      errors.push(error);
    }
  }

  if (errors.length > 0) {
    throw new AggregateError(errors, `Failed to dispose ${errors.length} service(s)`);
  }
}

// ============================================================================
// Resolver bound to a scope and a dependency path
// ============================================================================

class BoundResolver implements IServiceResolver {
  constructor(
    private readonly provider: ServiceProvider,
    private readonly scope: ScopeState | null,
    private readonly path: readonly Frame[],
  ) {}

  getService<T>(token: ServiceToken<T>, name?: string): T {
    return this.provider.resolve(token, name, this.scope, this.path);
  }

  tryGetService<T>(token: ServiceToken<T>, name?: string): T | undefined {
    return this.provider.isRegistered(token, name)
      ? this.getService(token, name)
      : undefined;
  }

  isRegistered(token: ServiceToken<unknown>, name?: string): boolean {
    return this.provider.isRegistered(token, name);
  }
}

// ============================================================================
// Provider
// ============================================================================

export class ServiceProvider implements IServiceProvider {
  private readonly entries = new Map<ServiceToken<unknown>, Map<string, Entry<unknown>>>();
  private readonly disposals: Disposal[] = [];
  private readonly logger: ILogger;
  private disposed = false;

  constructor(descriptors: DescriptorTable, options: ServiceProviderOptions = {}) {
    this.logger = options.logger ?? consoleLogger;

    for (const [token, byName] of descriptors) {
      const entries = new Map<string, Entry<unknown>>();
      for (const [name, descriptor] of byName) {
        entries.set(name, { descriptor, scoped: new WeakMap() });
      }
      this.entries.set(token, entries);
    }
  }

  getService<T>(token: ServiceToken<T>, name?: string): T {
    return this.resolve(token, name, null, []);
  }

  tryGetService<T>(token: ServiceToken<T>, name?: string): T | undefined {
    return this.isRegistered(token, name) ? this.getService(token, name) : undefined;
  }

  isRegistered(token: ServiceToken<unknown>, name?: string): boolean {
    return this.entry(token, name) !== undefined;
  }

  createScope(): IServiceScope {
    const state: ScopeState = { disposals: [], disposed: false };
    const resolver = new BoundResolver(this, state, []);

    return {
      getServiceProvider: () => resolver,
      dispose: async () => {
        if (state.disposed) return;
        state.disposed = true;
        await runDisposals(state.disposals);
      },
    };
  }

  validate(): void {
    const checked = new Set<Entry<unknown>>();
    const checkedUnderSingleton = new Set<Entry<unknown>>();

    const visit = (entry: Entry<unknown>, path: readonly Frame[]): void => {
      const underSingleton = singletonOwner(path) !== undefined;
      const memo = underSingleton ? checkedUnderSingleton : checked;
      if (memo.has(entry)) return;

      for (const dependency of entry.descriptor.dependencies) {
        const label = tokenName(dependency);
        const dependencyEntry = this.entry(dependency);

        if (!dependencyEntry) {
          throw unregisteredError(label, path);
        }
        if (path.some((frame) => frame.entry === dependencyEntry)) {
          throw circularError(label, path);
        }
        if (dependencyEntry.descriptor.lifetime === ServiceLifetime.Scoped) {
          const owner = singletonOwner(path);
          if (owner) {
            throw scopeMismatchError(owner, label, path);
          }
        }

        visit(dependencyEntry, [...path, { entry: dependencyEntry, label }]);
      }

      memo.add(entry);
    };

    for (const byName of this.entries.values()) {
      for (const entry of byName.values()) {
        const label = tokenName(entry.descriptor.token, entry.descriptor.name);
        visit(entry, [{ entry, label }]);
      }
    }
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    for (const byName of this.entries.values()) {
      for (const entry of byName.values()) {
        entry.singleton = undefined;
      }
    }
    await runDisposals(this.disposals);
  }

  /**
   * @internal Resolution entry point shared by the root provider and scopes.
   */
  resolve<T>(
    token: ServiceToken<T>,
    name: string | undefined,
    scope: ScopeState | null,
    path: readonly Frame[],
  ): T {
    const label = tokenName(token, name);

    if (this.disposed || scope?.disposed) {
      throw new DependencyResolutionError(
        `Cannot resolve '${label}': the ${scope?.disposed ? 'scope' : 'provider'} has been disposed`,
      );
    }

    const entry = this.entry(token, name);
    if (!entry) {
      throw unregisteredError(label, path);
    }
    if (path.some((frame) => frame.entry === entry)) {
      throw circularError(label, path);
    }

    const { descriptor } = entry;

    switch (descriptor.lifetime) {
      case ServiceLifetime.LazySingleton: {
        if (entry.singleton) {
          return entry.singleton.value;
        }
        const value = this.construct(entry, label, scope, path);
        entry.singleton = { value };
        this.track(this.disposals, descriptor, value);
        return value;
      }

      case ServiceLifetime.Scoped: {
        const owner = singletonOwner(path);
        if (owner) {
          throw scopeMismatchError(owner, label, path);
        }
        if (!scope) {
          throw new DependencyResolutionError(
            `Scoped service '${label}' cannot be resolved from the root provider. Create a scope first.`,
            renderGraph(path, `${label} (Scoped)`),
          );
        }
        const cached = entry.scoped.get(scope);
        if (cached) {
          return cached.value;
        }
        const value = this.construct(entry, label, scope, path);
        entry.scoped.set(scope, { value });
        this.track(scope.disposals, descriptor, value);
        return value;
      }

      case ServiceLifetime.Factory:
        return this.construct(entry, label, scope, path);
    }
  }

  private construct<T>(
    entry: Entry<T>,
    label: string,
    scope: ScopeState | null,
    path: readonly Frame[],
  ): T {
    const resolver = new BoundResolver(this, scope, [...path, { entry, label }]);

    try {
      const value = entry.descriptor.factory(resolver);
      this.logger.debug(`Created ${entry.descriptor.lifetime} '${label}'`);
      return value;
    } catch (error) {
      if (error instanceof DependencyResolutionError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new DependencyResolutionError(
        `Failed to construct '${label}': ${reason}`,
        renderGraph(path, `${label} (FAILED)`),
        { cause: error },
      );
    }
  }

  private track<T>(disposals: Disposal[], descriptor: ServiceDescriptor<T>, value: T): void {
    if (!descriptor.ownsInstance) return;

    if (descriptor.dispose) {
      disposals.push(() => descriptor.dispose?.(value));
    } else if (isDisposable(value)) {
      disposals.push(() => value.dispose());
    }
  }

  private entry<T>(token: ServiceToken<T>, name?: string): Entry<T> | undefined {
    // Entries are stored under their own token, so the entry found for `token` produces `T`.
    return this.entries.get(token)?.get(name ?? DEFAULT_REGISTRATION) as Entry<T> | undefined;
  }
}
