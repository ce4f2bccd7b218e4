/**
 * @fileoverview Failure values
 *
 * @module layered-app-kit/domain/failures
 *
 * ## Architectural Layer: DOMAIN
 *
 * A failure is the error arm of a {@link Result}. It is a frozen value that
 * travels up through return types; it is never thrown.
 *
 * The set of variants is closed. Code that needs to react to a failure uses
 * {@link matchFailure}, which refuses to compile until every kind has a
 * handler.
 *
 * | kind           | produced when                                   |
 * |----------------|-------------------------------------------------|
 * | `server`       | a remote answered with an error or bad payload  |
 * | `network`      | a remote could not be reached or timed out      |
 * | `cache`        | local storage could not be read or written      |
 * | `not-found`    | the requested resource does not exist           |
 * | `unauthorized` | the caller lacks credentials or permission      |
 * | `validation`   | input was rejected, with per-field messages     |
 * | `unexpected`   | anything the data layer could not classify      |
 */

import { valueEquals } from '../entity/valueEquals';

/**
 * Optional structured context attached to a failure.
 */
export type FailureDetails = Readonly<Record<string, unknown>>;

/**
 * Base shape shared by every failure variant.
 */
export abstract class Failure<TKind extends string = string> {
  protected constructor(
    public readonly kind: TKind,
    public readonly message: string,
    public readonly details?: FailureDetails,
  ) {}

  /**
   * Same kind, same message, structurally equal details and extra fields.
   */
  equals(other: Failure): boolean {
    return (
      other instanceof Failure &&
      Object.getPrototypeOf(this) === Object.getPrototypeOf(other) &&
      valueEquals(this, other)
    );
  }

  toString(): string {
    return `${this.constructor.name}(${this.kind}): ${this.message}`;
  }
}

export class ServerFailure extends Failure<'server'> {
  constructor(
    message: string = 'The server returned an error',
    public readonly statusCode?: number,
    details?: FailureDetails,
  ) {
    super('server', message, details);
    Object.freeze(this);
  }
}

export class NetworkFailure extends Failure<'network'> {
  constructor(
    message: string = 'The network is unreachable',
    details?: FailureDetails,
  ) {
    super('network', message, details);
    Object.freeze(this);
  }
}

export class CacheFailure extends Failure<'cache'> {
  constructor(
    message: string = 'No cached data available',
    details?: FailureDetails,
  ) {
    super('cache', message, details);
    Object.freeze(this);
  }
}

export class NotFoundFailure extends Failure<'not-found'> {
  constructor(message: string = 'Not found', details?: FailureDetails) {
    super('not-found', message, details);
    Object.freeze(this);
  }
}

export class UnauthorizedFailure extends Failure<'unauthorized'> {
  constructor(message: string = 'Unauthorized', details?: FailureDetails) {
    super('unauthorized', message, details);
    Object.freeze(this);
  }
}

export class ValidationFailure extends Failure<'validation'> {
  constructor(
    message: string = 'Validation failed',
    public readonly errors: Readonly<Record<string, readonly string[]>> = {},
  ) {
    super('validation', message, { errors });
    Object.freeze(this);
  }
}

export class UnexpectedFailure extends Failure<'unexpected'> {
  constructor(
    message: string = 'An unexpected error occurred',
    details?: FailureDetails,
  ) {
    super('unexpected', message, details);
    Object.freeze(this);
  }
}

/**
 * The closed union of failure variants.
 */
export type AppFailure =
  | ServerFailure
  | NetworkFailure
  | CacheFailure
  | NotFoundFailure
  | UnauthorizedFailure
  | ValidationFailure
  | UnexpectedFailure;

export type FailureKind = AppFailure['kind'];

/**
 * One handler per failure kind.
 */
export type FailureHandlers<R> = {
  [K in FailureKind]: (failure: Extract<AppFailure, { kind: K }>) => R;
};

/**
 * Exhaustive match over a failure.
 *
 * @example
 * ```typescript
 * const text = matchFailure(failure, {
 *   server: (f) => `Server error ${f.statusCode ?? ''}`,
 *   network: () => 'You are offline',
 *   cache: () => 'Nothing saved yet',
 *   'not-found': () => 'Not found',
 *   unauthorized: () => 'Please sign in',
 *   validation: (f) => Object.keys(f.errors).join(', '),
 *   unexpected: (f) => f.message,
 * });
 * ```
 */
export function matchFailure<R>(
  failure: AppFailure,
  handlers: FailureHandlers<R>,
): R {
  switch (failure.kind) {
    case 'server':
      return handlers.server(failure);
    case 'network':
      return handlers.network(failure);
    case 'cache':
      return handlers.cache(failure);
    case 'not-found':
      return handlers['not-found'](failure);
    case 'unauthorized':
      return handlers.unauthorized(failure);
    case 'validation':
      return handlers.validation(failure);
    case 'unexpected':
      return handlers.unexpected(failure);
  }
}

/**
 * Type guard for any failure value.
 */
export function isAppFailure(value: unknown): value is AppFailure {
  return value instanceof Failure;
}
