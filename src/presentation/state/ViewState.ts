/**
 * @fileoverview View state
 *
 * What a screen shows while it loads one piece of data:
 *
 * ```
 *   initial ──► loading ──► success(data)
 *                  │
 *                  └──────► failure(failure)
 * ```
 */

import type { AppFailure } from '../../domain/failures';
import type { Result } from '../../domain/result';

export interface InitialState {
  readonly status: 'initial';
}

export interface LoadingState {
  readonly status: 'loading';
}

export interface SuccessState<T> {
  readonly status: 'success';
  readonly data: T;
}

export interface FailureState<F> {
  readonly status: 'failure';
  readonly failure: F;
}

export type ViewState<T, F = AppFailure> =
  | InitialState
  | LoadingState
  | SuccessState<T>
  | FailureState<F>;

export type ViewStatus = ViewState<unknown>['status'];

export interface ViewStateHandlers<T, F, R> {
  initial: () => R;
  loading: () => R;
  success: (data: T) => R;
  failure: (failure: F) => R;
}

const INITIAL: InitialState = Object.freeze({ status: 'initial' });
const LOADING: LoadingState = Object.freeze({ status: 'loading' });

export const ViewStates = {
  initial(): InitialState {
    return INITIAL;
  },

  loading(): LoadingState {
    return LOADING;
  },

  success<T>(data: T): SuccessState<T> {
    const state: SuccessState<T> = { status: 'success', data };
    return Object.freeze(state);
  },

  failure<F>(failure: F): FailureState<F> {
    const state: FailureState<F> = { status: 'failure', failure };
    return Object.freeze(state);
  },

  fromResult<F, T>(result: Result<F, T>): SuccessState<T> | FailureState<F> {
    return result.success ? ViewStates.success(result.value) : ViewStates.failure(result.failure);
  },

  /**
   * Exhaustive match; every status needs a handler.
   */
  match<T, F, R>(state: ViewState<T, F>, handlers: ViewStateHandlers<T, F, R>): R {
    switch (state.status) {
      case 'initial':
        return handlers.initial();
      case 'loading':
        return handlers.loading();
      case 'success':
        return handlers.success(state.data);
      case 'failure':
        return handlers.failure(state.failure);
    }
  },
};
