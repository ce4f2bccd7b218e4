/**
 * @fileoverview The data-layer boundary
 *
 * Repositories call data sources through {@link guardDataCall}. It is the
 * only place where raw exceptions are caught; what comes out is always a
 * {@link Result}.
 */

import { consoleLogger, ILogger } from '../../application/logging';
import { AppFailure } from '../../domain/failures';
import { Result, Results } from '../../domain/result';
import { createDefaultFailureMapper, errorMessage, IFailureMapper } from './FailureMapper';

export interface GuardOptions {
  /** Translates caught errors; defaults to {@link createDefaultFailureMapper} */
  mapper?: IFailureMapper;

  logger?: ILogger;

  /** Names the operation in log lines */
  label?: string;
}

const defaultMapper = createDefaultFailureMapper();

/**
 * Run `operation` and capture its outcome as a result.
 *
 * @example
 * ```typescript
 * getArticle(id: string): Promise<Result<AppFailure, Article>> {
 *   return guardDataCall(async () => toEntity(await this.remote.fetchArticle(id)), {
 *     label: 'getArticle',
 *   });
 * }
 * ```
 */
export async function guardDataCall<T>(
  operation: () => T | Promise<T>,
  options: GuardOptions = {},
): Promise<Result<AppFailure, T>> {
  try {
    return Results.success(await operation());
  } catch (error) {
    const failure = (options.mapper ?? defaultMapper).map(error) ?? defaultMapper.map(error);
    const logger = options.logger ?? consoleLogger;
    logger.warn(
      `${options.label ?? 'Data call'} failed with ${failure.kind} failure: ${errorMessage(error)}`,
    );
    return Results.failure(failure);
  }
}
