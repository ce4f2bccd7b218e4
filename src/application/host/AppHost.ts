/**
 * @fileoverview Application host
 *
 * The composition root at run time. Feature modules register their services,
 * the host builds and validates the provider, and on stop disposes every
 * singleton it created.
 *
 * @example
 * ```typescript
 * const host = createHost({ name: 'reader' })
 *   .addModule(coreModule)
 *   .addModule(articlesModule);
 *
 * const services = await host.start();
 * const controller = services.getService(ArticleListController);
 * ```
 */

import {
  createToken,
  InjectionToken,
  IServiceCollection,
  IServiceProvider,
  ServiceCollection,
} from '../di';
import { consoleLogger, ILogger } from '../logging';

/**
 * A unit of registration, usually one per feature plus one for `core`.
 */
export interface IAppModule {
  readonly name: string;
  register(services: IServiceCollection): void;
}

export interface AppHostOptions {
  /** Application name */
  name?: string;

  /** Validate every registration's dependencies at start (default: true) */
  validateOnStart?: boolean;

  /** Stop on SIGINT/SIGTERM and exit the process (default: false) */
  gracefulShutdown?: boolean;

  /** Shutdown timeout in milliseconds (default: 30000) */
  shutdownTimeout?: number;

  logger?: ILogger;
}

export type HostStatus = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

/**
 * The host's logger, registered for every application.
 */
export const LOGGER: InjectionToken<ILogger> = createToken<ILogger>('ILogger');

export class AppHost {
  readonly name: string;
  private _status: HostStatus = 'stopped';
  private readonly modules: IAppModule[] = [];
  private provider: IServiceProvider | null = null;
  private readonly logger: ILogger;
  private signalHandler: (() => void) | null = null;

  constructor(private readonly options: AppHostOptions = {}) {
    this.name = options.name ?? 'app';
    this.logger = options.logger ?? consoleLogger;
  }

  get status(): HostStatus {
    return this._status;
  }

  /**
   * The running application's provider.
   */
  get services(): IServiceProvider {
    if (!this.provider || this._status !== 'running') {
      throw new Error(`Host ${this.name} is not running`);
    }
    return this.provider;
  }

  addModule(module: IAppModule): this {
    if (this._status !== 'stopped') {
      throw new Error(`Cannot add module '${module.name}' while the host is ${this._status}`);
    }
    if (this.modules.some((existing) => existing.name === module.name)) {
      throw new Error(`Module '${module.name}' has already been added`);
    }
    this.modules.push(module);
    return this;
  }

  getModules(): readonly IAppModule[] {
    return [...this.modules];
  }

  async start(): Promise<IServiceProvider> {
    const failedStart = this._status === 'error' && this.provider === null;
    if (this._status !== 'stopped' && !failedStart) {
      throw new Error(`Cannot start host in ${this._status} state`);
    }

    this._status = 'starting';
    this.logger.info(`Starting host: ${this.name}`);

    try {
      const services = new ServiceCollection();
      services.addInstance(LOGGER, this.logger);

      for (const module of this.modules) {
        this.logger.info(`Registering module: ${module.name}`);
        module.register(services);
      }

      const provider = services.buildServiceProvider({
        validateOnBuild: this.options.validateOnStart !== false,
        logger: this.logger,
      });
      this.provider = provider;

      if (this.options.gracefulShutdown) {
        this.setupGracefulShutdown();
      }

      await this.onStart?.(provider);

      this._status = 'running';
      this.logger.info(`Host ${this.name} started with ${this.modules.length} module(s)`);
      return provider;
    } catch (error) {
      this._status = 'error';
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Host ${this.name} failed to start: ${failure.message}`);
      await this.releaseProvider();
      await this.onError?.(failure);
      throw error;
    }
  }

  /**
   * Dispose what a failed start created. The host stays in `error` and may
   * be started again.
   */
  private async releaseProvider(): Promise<void> {
    const provider = this.provider;
    this.provider = null;
    this.removeGracefulShutdown();
    try {
      await provider?.dispose();
    } catch (error) {
      this.logger.error(
        `Error disposing services after failed start: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  async stop(): Promise<void> {
    if (this._status !== 'running') {
      return;
    }

    this._status = 'stopping';
    this.logger.info(`Stopping host: ${this.name}`);
    this.removeGracefulShutdown();

    const timeout = this.options.shutdownTimeout ?? 30000;
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        this.provider?.dispose(),
        new Promise<void>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Shutdown timeout')), timeout);
        }),
      ]);

      await this.onStop?.();
      this.provider = null;
      this._status = 'stopped';
      this.logger.info(`Host ${this.name} stopped successfully`);
    } catch (error) {
      this.logger.error(
        `Error during shutdown: ${error instanceof Error ? error.message : String(error)}`,
      );
      this._status = 'error';
    } finally {
      clearTimeout(timer);
    }
  }

  private setupGracefulShutdown(): void {
    const handler = (): void => {
      this.logger.info('Received shutdown signal, stopping...');
      this.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          this.logger.error('Shutdown failed', error);
          process.exit(1);
        },
      );
    };

    this.signalHandler = handler;
    process.once('SIGTERM', handler);
    process.once('SIGINT', handler);
  }

  private removeGracefulShutdown(): void {
    if (!this.signalHandler) return;
    process.removeListener('SIGTERM', this.signalHandler);
    process.removeListener('SIGINT', this.signalHandler);
    this.signalHandler = null;
  }

  // Lifecycle hooks for subclasses
  onStart?(services: IServiceProvider): Promise<void>;
  onStop?(): Promise<void>;
  onError?(error: Error): Promise<void>;
}

/**
 * Create a new host
 */
export function createHost(options?: AppHostOptions): AppHost {
  return new AppHost(options);
}

/**
 * Build an {@link IAppModule} from a name and a registration function.
 */
export function defineModule(
  name: string,
  register: (services: IServiceCollection) => void,
): IAppModule {
  return { name, register };
}
