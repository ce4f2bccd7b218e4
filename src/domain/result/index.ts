/**
 * @module layered-app-kit/domain/result
 * @description Result values for fallible operations
 */

export { Results } from './Result';

export type {
  Result,
  AsyncResult,
  SuccessResult,
  FailedResult,
} from './Result';
