/**
 * @module layered-app-kit/domain/failures
 * @description Closed set of failure variants
 */

export {
  Failure,
  ServerFailure,
  NetworkFailure,
  CacheFailure,
  NotFoundFailure,
  UnauthorizedFailure,
  ValidationFailure,
  UnexpectedFailure,
  matchFailure,
  isAppFailure,
} from './Failure';

export type {
  AppFailure,
  FailureKind,
  FailureDetails,
  FailureHandlers,
} from './Failure';
