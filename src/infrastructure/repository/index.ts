/**
 * @module layered-app-kit/infrastructure/repository
 */

export { RepositoryFetcher, FetchPolicy, OFFLINE_MESSAGE } from './RepositoryFetcher';
export type { FetchRequest, RepositoryFetcherOptions } from './RepositoryFetcher';
