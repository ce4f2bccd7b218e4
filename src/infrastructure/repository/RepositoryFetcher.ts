/**
 * @fileoverview Remote/local fetch policies for repository implementations
 *
 * @module layered-app-kit/infrastructure/repository
 *
 * ## Architectural Layer: DATA
 *
 * A repository implementation owns one remote and one local data source.
 * {@link RepositoryFetcher} decides which to ask, keeps the local copy
 * fresh, and hands back a domain entity or a failure:
 *
 * ```
 *   RemoteFirst
 *   ┌──────────────┐  online   ┌────────┐  ok   ┌─────────────┐
 *   │ isConnected? │ ────────► │ remote │ ────► │ write cache │ ──► success
 *   └──────┬───────┘           └───┬────┘       └─────────────┘
 *          │ offline               │ NetworkFailure
 *          ▼                       ▼
 *     ┌────────────┐  hit   ┌────────────┐
 *     │ read cache │ ─────► │  success   │
 *     └────────────┘        └────────────┘
 * ```
 */

import { consoleLogger, ILogger } from '../../application/logging';
import { AppFailure, CacheFailure, NetworkFailure } from '../../domain/failures';
import { Result, Results } from '../../domain/result';
import { IFailureMapper } from '../data/FailureMapper';
import { GuardOptions, guardDataCall } from '../data/guardDataCall';
import { INetworkInfo } from '../network';

export enum FetchPolicy {
  /** Ask the remote; fall back to the local copy when the network fails */
  RemoteFirst = 'remote-first',

  /** Use the local copy when there is one; otherwise behave as RemoteFirst */
  CacheFirst = 'cache-first',

  /** Remote only; the local copy is neither read nor written */
  RemoteOnly = 'remote-only',

  /** Local copy only */
  CacheOnly = 'cache-only',
}

export const OFFLINE_MESSAGE = 'No network connection and no cached copy';

export interface FetchRequest<TModel, TEntity> {
  remote: () => Promise<TModel>;

  /** Resolves `undefined` on a miss */
  readCache?: () => Promise<TModel | undefined>;

  writeCache?: (model: TModel) => Promise<void>;

  toEntity: (model: TModel) => TEntity;

  /** Defaults to the fetcher's policy */
  policy?: FetchPolicy;

  /** Names the operation in log lines */
  label?: string;
}

export interface RepositoryFetcherOptions {
  networkInfo: INetworkInfo;

  /** Default: {@link FetchPolicy.RemoteFirst} */
  defaultPolicy?: FetchPolicy;

  mapper?: IFailureMapper;
  logger?: ILogger;
}

type Lookup<TModel> =
  | { readonly hit: true; readonly model: TModel }
  | { readonly hit: false; readonly failure?: AppFailure };

export class RepositoryFetcher {
  private readonly networkInfo: INetworkInfo;
  private readonly defaultPolicy: FetchPolicy;
  private readonly mapper?: IFailureMapper;
  private readonly logger: ILogger;

  constructor(options: RepositoryFetcherOptions) {
    this.networkInfo = options.networkInfo;
    this.defaultPolicy = options.defaultPolicy ?? FetchPolicy.RemoteFirst;
    this.mapper = options.mapper;
    this.logger = options.logger ?? consoleLogger;
  }

  async fetch<TModel, TEntity>(
    request: FetchRequest<TModel, TEntity>,
  ): Promise<Result<AppFailure, TEntity>> {
    const policy = request.policy ?? this.defaultPolicy;

    switch (policy) {
      case FetchPolicy.RemoteFirst:
        return this.remoteFirst(request);

      case FetchPolicy.CacheFirst: {
        const cached = await this.readCache(request);
        if (cached.hit) {
          return this.convert(request, cached.model);
        }
        if (cached.failure) {
          this.logger.warn(`${this.label(request)}: local copy unreadable, asking the remote`);
        }
        return this.remoteFirst(request);
      }

      case FetchPolicy.RemoteOnly: {
        if (!(await this.isOnline(request))) {
          return Results.failure(new NetworkFailure());
        }
        const remote = await guardDataCall(request.remote, this.guardOptions(request, 'remote'));
        return remote.success ? this.convert(request, remote.value) : remote;
      }

      case FetchPolicy.CacheOnly: {
        const cached = await this.readCache(request);
        if (cached.hit) {
          return this.convert(request, cached.model);
        }
        return Results.failure(cached.failure ?? new CacheFailure());
      }
    }
  }

  private async remoteFirst<TModel, TEntity>(
    request: FetchRequest<TModel, TEntity>,
  ): Promise<Result<AppFailure, TEntity>> {
    if (!(await this.isOnline(request))) {
      const cached = await this.readCache(request);
      if (cached.hit) {
        return this.convert(request, cached.model);
      }
      return Results.failure(cached.failure ?? new NetworkFailure(OFFLINE_MESSAGE));
    }

    const remote = await guardDataCall(request.remote, this.guardOptions(request, 'remote'));

    if (remote.success) {
      const converted = await this.convert(request, remote.value);
      if (converted.success) {
        await this.writeCache(request, remote.value);
      }
      return converted;
    }

    if (remote.failure.kind !== 'network') {
      return remote;
    }

    const cached = await this.readCache(request);
    if (cached.hit) {
      this.logger.info(`${this.label(request)}: remote unreachable, serving the local copy`);
      return this.convert(request, cached.model);
    }
    return remote;
  }

  /** A connectivity check that fails counts as offline. */
  private async isOnline(request: { label?: string }): Promise<boolean> {
    const check = await guardDataCall(
      () => this.networkInfo.isConnected(),
      this.guardOptions(request, 'connectivity'),
    );
    return check.success && check.value;
  }

  private async readCache<TModel>(request: FetchRequest<TModel, unknown>): Promise<Lookup<TModel>> {
    const { readCache } = request;
    if (!readCache) {
      return { hit: false };
    }

    const read = await guardDataCall(readCache, this.guardOptions(request, 'read cache'));
    if (!read.success) {
      return { hit: false, failure: read.failure };
    }
    return read.value === undefined ? { hit: false } : { hit: true, model: read.value };
  }

  private async writeCache<TModel>(request: FetchRequest<TModel, unknown>, model: TModel): Promise<void> {
    const { writeCache } = request;
    if (!writeCache) return;

    const written = await guardDataCall(
      () => writeCache(model),
      this.guardOptions(request, 'write cache'),
    );
    if (!written.success) {
      this.logger.warn(`${this.label(request)}: local copy not updated (${written.failure.message})`);
    }
  }

  private convert<TModel, TEntity>(
    request: FetchRequest<TModel, TEntity>,
    model: TModel,
  ): Promise<Result<AppFailure, TEntity>> {
    return guardDataCall(() => request.toEntity(model), this.guardOptions(request, 'convert'));
  }

  private guardOptions(request: { label?: string }, step: string): GuardOptions {
    return {
      mapper: this.mapper,
      logger: this.logger,
      label: `${this.label(request)} (${step})`,
    };
  }

  private label(request: { label?: string }): string {
    return request.label ?? 'fetch';
  }
}
