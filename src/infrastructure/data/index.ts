/**
 * @module layered-app-kit/infrastructure/data
 * @description Data-layer exceptions, failure mapping and models
 */

export {
  DataException,
  ServerException,
  NetworkException,
  TimeoutException,
  CacheException,
  FormatException,
} from './exceptions';
export type { FormatIssues } from './exceptions';

export {
  FailureMapperChain,
  ServerExceptionMapper,
  FormatExceptionMapper,
  CacheExceptionMapper,
  EntityValidationErrorMapper,
  ConnectivityErrorMapper,
  createFailureMapper,
  createDefaultFailureMapper,
  errorMessage,
} from './FailureMapper';
export type { IFailureMapper, FailureMapperFunction } from './FailureMapper';

export { guardDataCall } from './guardDataCall';
export type { GuardOptions } from './guardDataCall';

export { defineModel, zodIssues } from './Model';
export type { ModelCodec, ModelDefinition, JsonValue } from './Model';
