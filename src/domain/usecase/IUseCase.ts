/**
 * @fileoverview Use cases
 *
 * @module layered-app-kit/domain/usecase
 *
 * A use case is one business operation composed from one or more repository
 * calls. It receives its repositories through the constructor and returns a
 * {@link Result}; it never throws to signal a domain-relevant failure.
 *
 * @example
 * ```typescript
 * export class GetArticle implements IUseCase<{ id: string }, Article> {
 *   constructor(private readonly repository: ArticleRepository) {}
 *
 *   execute(params: { id: string }): AsyncResult<AppFailure, Article> {
 *     return this.repository.getById(params.id);
 *   }
 * }
 * ```
 */

import type { AppFailure } from '../failures/Failure';
import type { AsyncResult } from '../result/Result';

export interface IUseCase<TParams, TValue, TFailure = AppFailure> {
  execute(params: TParams): AsyncResult<TFailure, TValue>;
}

/**
 * Parameter type for use cases that take no input.
 */
export type NoParams = Readonly<Record<string, never>>;

export const NO_PARAMS: NoParams = Object.freeze({});
