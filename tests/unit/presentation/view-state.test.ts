/**
 * @fileoverview Unit tests for view state and failure messages
 */

import {
  CacheFailure,
  describeFailure,
  NetworkFailure,
  NotFoundFailure,
  Results,
  ServerFailure,
  UnauthorizedFailure,
  UnexpectedFailure,
  ValidationFailure,
  ViewState,
  ViewStates,
} from '../../../src';

const render = (state: ViewState<number>): string =>
  ViewStates.match(state, {
    initial: () => 'idle',
    loading: () => 'spinner',
    success: (n) => `value ${n}`,
    failure: (f) => `error ${f.kind}`,
  });

describe('ViewStates', () => {
  it('should share the initial and loading states', () => {
    expect(ViewStates.initial()).toBe(ViewStates.initial());
    expect(ViewStates.loading()).toEqual({ status: 'loading' });
    expect(Object.isFrozen(ViewStates.loading())).toBe(true);
  });

  it('should build frozen success and failure states', () => {
    const success = ViewStates.success([1]);

    expect(success).toEqual({ status: 'success', data: [1] });
    expect(Object.isFrozen(success)).toBe(true);
    expect(ViewStates.failure('boom')).toEqual({ status: 'failure', failure: 'boom' });
  });

  it('should convert results', () => {
    expect(ViewStates.fromResult(Results.success(3))).toEqual({ status: 'success', data: 3 });
    expect(ViewStates.fromResult(Results.failure('x'))).toEqual({
      status: 'failure',
      failure: 'x',
    });
  });

  it('should match every status', () => {
    expect(render(ViewStates.initial())).toBe('idle');
    expect(render(ViewStates.loading())).toBe('spinner');
    expect(render(ViewStates.success(4))).toBe('value 4');
    expect(render(ViewStates.failure(new NetworkFailure()))).toBe('error network');
  });
});

describe('describeFailure', () => {
  it('should give one message per kind', () => {
    expect(describeFailure(new ServerFailure())).toBe(
      'Something went wrong on our side. Please try again later.',
    );
    expect(describeFailure(new NetworkFailure())).toBe(
      'You appear to be offline. Check your connection and try again.',
    );
    expect(describeFailure(new CacheFailure())).toBe('Nothing has been saved on this device yet.');
    expect(describeFailure(new NotFoundFailure())).toBe(
      'We could not find what you were looking for.',
    );
    expect(describeFailure(new UnauthorizedFailure())).toBe('Please sign in to continue.');
    expect(describeFailure(new UnexpectedFailure())).toBe('An unexpected error occurred.');
  });

  it('should name the fields of a validation failure', () => {
    expect(
      describeFailure(new ValidationFailure('Invalid', { title: ['empty'], body: ['short'] })),
    ).toBe('Please check: title, body.');
    expect(describeFailure(new ValidationFailure('Article id is required'))).toBe(
      'Article id is required',
    );
  });
});
