/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * The data side of an application: everything that talks to the outside
 * world and turns what comes back into domain values.
 *
 * - **Data**: exceptions, the exception → failure boundary, models
 * - **Network**: HTTP client and connectivity probes
 * - **Storage**: key-value storage for local data sources
 * - **Repository**: remote/local fetch policies
 * - **Cache**: the LRU + TTL cache under the memory store
 *
 * @packageDocumentation
 * @module layered-app-kit/infrastructure
 *
 * @example
 * ```typescript
 * import { FetchHttpClient, RepositoryFetcher, StaticNetworkInfo } from 'layered-app-kit';
 *
 * const fetcher = new RepositoryFetcher({ networkInfo: new StaticNetworkInfo(true) });
 * const result = await fetcher.fetch({
 *   remote: () => remote.fetchArticle(id),
 *   readCache: () => local.readArticle(id),
 *   writeCache: (model) => local.writeArticle(model),
 *   toEntity: ArticleModels.toEntity,
 * });
 * ```
 */

// Exceptions, failure mapping, models
export * from './data';

// HTTP and connectivity
export * from './network';

// Local key-value storage
export * from './storage';

// Fetch policies
export * from './repository';

// LRU + TTL cache
export * from './cache';
