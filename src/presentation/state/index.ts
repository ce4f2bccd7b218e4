/**
 * @module layered-app-kit/presentation/state
 */

export { Observable } from './Observable';
export type { Listener, Equality, SubscribeOptions } from './Observable';

export { ViewStates } from './ViewState';
export type {
  ViewState,
  ViewStatus,
  ViewStateHandlers,
  InitialState,
  LoadingState,
  SuccessState,
  FailureState,
} from './ViewState';

export { describeFailure } from './describeFailure';
