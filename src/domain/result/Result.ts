/**
 * @fileoverview Two-armed result values
 *
 * @module layered-app-kit/domain/result
 *
 * ## Architectural Layer: DOMAIN
 *
 * Every domain or data operation that can fail returns a `Result` instead of
 * throwing. The failure arm comes first, the success arm second:
 *
 * ```typescript
 * interface ArticleRepository {
 *   getArticle(id: string): Promise<Result<AppFailure, Article>>;
 * }
 * ```
 *
 * Callers must look at `success` before they can reach `value` or `failure`,
 * and {@link Results.fold} takes both arms, so an unhandled arm does not
 * compile.
 *
 * Results are frozen. The helpers never mutate their input.
 */

export interface SuccessResult<TValue> {
  readonly success: true;
  readonly value: TValue;
}

export interface FailedResult<TFailure> {
  readonly success: false;
  readonly failure: TFailure;
}

export type Result<TFailure, TValue> =
  | FailedResult<TFailure>
  | SuccessResult<TValue>;

/**
 * Shorthand for the return type of asynchronous fallible operations.
 */
export type AsyncResult<TFailure, TValue> = Promise<Result<TFailure, TValue>>;

/**
 * Constructors and combinators for {@link Result}.
 */
export const Results = {
  success<TValue>(value: TValue): SuccessResult<TValue> {
    const result: SuccessResult<TValue> = { success: true, value };
    return Object.freeze(result);
  },

  failure<TFailure>(failure: TFailure): FailedResult<TFailure> {
    const result: FailedResult<TFailure> = { success: false, failure };
    return Object.freeze(result);
  },

  isSuccess<TFailure, TValue>(
    result: Result<TFailure, TValue>,
  ): result is SuccessResult<TValue> {
    return result.success;
  },

  isFailure<TFailure, TValue>(
    result: Result<TFailure, TValue>,
  ): result is FailedResult<TFailure> {
    return !result.success;
  },

  /**
   * Collapse both arms into one value.
   */
  fold<TFailure, TValue, R>(
    result: Result<TFailure, TValue>,
    onFailure: (failure: TFailure) => R,
    onSuccess: (value: TValue) => R,
  ): R {
    return result.success ? onSuccess(result.value) : onFailure(result.failure);
  },

  map<TFailure, TValue, TNext>(
    result: Result<TFailure, TValue>,
    fn: (value: TValue) => TNext,
  ): Result<TFailure, TNext> {
    return result.success ? Results.success(fn(result.value)) : result;
  },

  mapFailure<TFailure, TValue, TNextFailure>(
    result: Result<TFailure, TValue>,
    fn: (failure: TFailure) => TNextFailure,
  ): Result<TNextFailure, TValue> {
    return result.success ? result : Results.failure(fn(result.failure));
  },

  flatMap<TFailure, TValue, TNext, TNextFailure = TFailure>(
    result: Result<TFailure, TValue>,
    fn: (value: TValue) => Result<TNextFailure, TNext>,
  ): Result<TFailure | TNextFailure, TNext> {
    return result.success ? fn(result.value) : result;
  },

  async flatMapAsync<TFailure, TValue, TNext, TNextFailure = TFailure>(
    result: Result<TFailure, TValue>,
    fn: (value: TValue) => Promise<Result<TNextFailure, TNext>>,
  ): Promise<Result<TFailure | TNextFailure, TNext>> {
    return result.success ? fn(result.value) : result;
  },

  getOrElse<TFailure, TValue>(
    result: Result<TFailure, TValue>,
    fallback: (failure: TFailure) => TValue,
  ): TValue {
    return result.success ? result.value : fallback(result.failure);
  },

  /**
   * Run a side effect on success and pass the result through unchanged.
   */
  tap<TFailure, TValue>(
    result: Result<TFailure, TValue>,
    fn: (value: TValue) => void,
  ): Result<TFailure, TValue> {
    if (result.success) {
      fn(result.value);
    }
    return result;
  },

  /**
   * All values in order, or the first failure.
   */
  combine<TFailure, TValue>(
    results: readonly Result<TFailure, TValue>[],
  ): Result<TFailure, TValue[]> {
    const values: TValue[] = [];
    for (const result of results) {
      if (!result.success) {
        return result;
      }
      values.push(result.value);
    }
    return Results.success(values);
  },
};
