/**
 * @fileoverview Exception → Failure translation
 *
 * Mappers are tried in order. A mapper that does not recognise the error
 * returns `undefined` and the chain moves on; an error nobody claims becomes
 * an {@link UnexpectedFailure}.
 *
 * @example
 * ```typescript
 * const mapper = createDefaultFailureMapper().addMapper(
 *   createFailureMapper((error) =>
 *     error instanceof QuotaExceededError
 *       ? new CacheFailure('Device storage is full')
 *       : undefined,
 *   ),
 * );
 * ```
 */

import { EntityValidationError } from '../../domain/entity';
import {
  AppFailure,
  CacheFailure,
  NetworkFailure,
  NotFoundFailure,
  ServerFailure,
  UnauthorizedFailure,
  UnexpectedFailure,
  ValidationFailure,
} from '../../domain/failures';
import {
  CacheException,
  FormatException,
  NetworkException,
  ServerException,
} from './exceptions';

export interface IFailureMapper {
  /**
   * @returns the failure for `error`, or `undefined` to pass it on
   */
  map(error: unknown): AppFailure | undefined;
}

export type FailureMapperFunction = (error: unknown) => AppFailure | undefined;

export function createFailureMapper(fn: FailureMapperFunction): IFailureMapper {
  return { map: fn };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ==================== Built-in Mappers ====================

/**
 * Status-based mapping of {@link ServerException}.
 */
export class ServerExceptionMapper implements IFailureMapper {
  map(error: unknown): AppFailure | undefined {
    if (!(error instanceof ServerException)) {
      return undefined;
    }

    switch (error.statusCode) {
      case 404:
        return new NotFoundFailure(error.message);
      case 401:
      case 403:
        return new UnauthorizedFailure(error.message);
      default:
        return new ServerFailure(
          error.message,
          error.statusCode,
          error.body === undefined ? undefined : { body: error.body },
        );
    }
  }
}

/**
 * A payload the client could not decode is the server's fault.
 */
export class FormatExceptionMapper implements IFailureMapper {
  map(error: unknown): AppFailure | undefined {
    if (!(error instanceof FormatException)) {
      return undefined;
    }
    return new ServerFailure(error.message, undefined, { issues: error.issues });
  }
}

export class CacheExceptionMapper implements IFailureMapper {
  map(error: unknown): AppFailure | undefined {
    if (!(error instanceof CacheException)) {
      return undefined;
    }
    return new CacheFailure(error.message);
  }
}

/**
 * Data that reached the domain edge and was rejected there.
 */
export class EntityValidationErrorMapper implements IFailureMapper {
  map(error: unknown): AppFailure | undefined {
    if (!(error instanceof EntityValidationError)) {
      return undefined;
    }
    return new ValidationFailure(error.message, { [error.entityName]: error.problems });
  }
}

const CONNECTIVITY_ERROR_NAMES: ReadonlySet<string> = new Set(['TimeoutError', 'AbortError']);

const CONNECTIVITY_ERROR_CODES: ReadonlySet<string> = new Set([
  'ETIMEDOUT',
  'ECONNABORTED',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
]);

const TIMEOUT_MESSAGE = /timed out|timeout/i;

function isConnectivityShaped(error: unknown, depth = 0): boolean {
  if (typeof error !== 'object' || error === null || depth > 3) {
    return false;
  }
  if (error instanceof Error) {
    if (CONNECTIVITY_ERROR_NAMES.has(error.name) || TIMEOUT_MESSAGE.test(error.message)) {
      return true;
    }
  }
  if ('code' in error && typeof error.code === 'string' && CONNECTIVITY_ERROR_CODES.has(error.code)) {
    return true;
  }
  return 'cause' in error && isConnectivityShaped(error.cause, depth + 1);
}

/**
 * {@link NetworkException}, {@link TimeoutException}, and errors from other
 * clients that look like a timeout or a refused/reset connection.
 */
export class ConnectivityErrorMapper implements IFailureMapper {
  map(error: unknown): AppFailure | undefined {
    if (error instanceof NetworkException || isConnectivityShaped(error)) {
      return new NetworkFailure(errorMessage(error));
    }
    return undefined;
  }
}

// ==================== Chain ====================

/**
 * Runs mappers in order; always produces a failure.
 */
export class FailureMapperChain implements IFailureMapper {
  private readonly mappers: IFailureMapper[] = [];

  addMapper(mapper: IFailureMapper): this {
    this.mappers.push(mapper);
    return this;
  }

  addMappers(mappers: readonly IFailureMapper[]): this {
    this.mappers.push(...mappers);
    return this;
  }

  /**
   * Insert a mapper ahead of the ones already registered.
   */
  prependMapper(mapper: IFailureMapper): this {
    this.mappers.unshift(mapper);
    return this;
  }

  map(error: unknown): AppFailure {
    for (const mapper of this.mappers) {
      const failure = mapper.map(error);
      if (failure) {
        return failure;
      }
    }

    return new UnexpectedFailure(undefined, { error: errorMessage(error) });
  }
}

/**
 * The chain used when no mapper is supplied.
 */
export function createDefaultFailureMapper(): FailureMapperChain {
  return new FailureMapperChain().addMappers([
    new ServerExceptionMapper(),
    new FormatExceptionMapper(),
    new CacheExceptionMapper(),
    new EntityValidationErrorMapper(),
    new ConnectivityErrorMapper(),
  ]);
}
