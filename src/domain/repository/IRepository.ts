/**
 * @fileoverview Repository contracts
 *
 * @module layered-app-kit/domain/repository
 *
 * ## Architectural Layer: DOMAIN
 *
 * The domain declares what data it needs; the data layer decides where it
 * comes from. A repository contract therefore says nothing about HTTP,
 * caches or connectivity. Whether a read goes to the network first, or falls
 * back to a local copy when offline, is a data-layer policy that stays
 * invisible from here.
 *
 * Every member returns a {@link Result}. The architecture checker's
 * `repository-contract` rule enforces this for files under
 * `domain/repositories`.
 *
 * @example
 * ```typescript
 * export interface ArticleRepository extends IReadRepository<Article> {
 *   search(query: string): AsyncResult<AppFailure, readonly Article[]>;
 * }
 *
 * export const ARTICLE_REPOSITORY =
 *   createToken<ArticleRepository>('ArticleRepository');
 * ```
 */

import type { AppFailure } from '../failures/Failure';
import type { AsyncResult } from '../result/Result';

/**
 * Read access to one aggregate, keyed by id.
 */
export interface IReadRepository<TEntity, TId = string> {
  getById(id: TId): AsyncResult<AppFailure, TEntity>;

  getAll(): AsyncResult<AppFailure, readonly TEntity[]>;
}

/**
 * Read and write access to one aggregate.
 */
export interface IRepository<TEntity, TId = string>
  extends IReadRepository<TEntity, TId> {
  save(entity: TEntity): AsyncResult<AppFailure, TEntity>;

  delete(id: TId): AsyncResult<AppFailure, void>;
}
