/**
 * @fileoverview Jest test setup and global utilities
 *
 * Provides custom matchers for Result and Failure values.
 */

import 'reflect-metadata';

import type { FailureKind } from '../src/domain/failures';

// ============================================================================
// Global Type Declarations
// ============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace jest {
    interface Matchers<R> {
      /**
       * Check that a Result is a success, optionally with an equal value
       * @param expected Value compared with recursive equality
       */
      toBeSuccess(expected?: unknown): R;

      /**
       * Check that a Result is a failure of the given kind
       * @param kind Failure kind, e.g. 'network'
       */
      toBeFailureOfKind(kind: FailureKind): R;

      /**
       * Check if error is of specific type
       * @param expected Error constructor
       */
      toThrowErrorType(expected: abstract new (...args: never[]) => Error): R;
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function describeResult(value: unknown): string {
  if (!isRecord(value) || typeof value.success !== 'boolean') {
    return `a non-result value (${String(value)})`;
  }
  if (value.success) {
    return `a success with ${JSON.stringify(value.value)}`;
  }
  const failure = value.failure;
  return isRecord(failure)
    ? `a ${String(failure.kind)} failure: ${String(failure.message)}`
    : 'a failure';
}

// ============================================================================
// Custom Jest Matchers
// ============================================================================

expect.extend({
  toBeSuccess(received: unknown, ...rest: unknown[]) {
    const hasExpected = rest.length > 0;
    const isSuccess = isRecord(received) && received.success === true;
    const pass = isSuccess && (!hasExpected || this.equals(received.value, rest[0]));

    return {
      pass,
      message: () =>
        pass
          ? `Expected result not to be a success, but it was ${describeResult(received)}`
          : hasExpected
            ? `Expected a success with ${JSON.stringify(rest[0])}, but got ${describeResult(received)}`
            : `Expected a success, but got ${describeResult(received)}`,
    };
  },

  toBeFailureOfKind(received: unknown, kind: FailureKind) {
    const pass =
      isRecord(received) &&
      received.success === false &&
      isRecord(received.failure) &&
      received.failure.kind === kind;

    return {
      pass,
      message: () =>
        pass
          ? `Expected result not to be a ${kind} failure`
          : `Expected a ${kind} failure, but got ${describeResult(received)}`,
    };
  },

  toThrowErrorType(received: () => void, expected: abstract new (...args: never[]) => Error) {
    try {
      received();
      return {
        pass: false,
        message: () => `Expected function to throw ${expected.name}, but it didn't throw`,
      };
    } catch (error) {
      const pass = error instanceof expected;
      return {
        pass,
        message: () =>
          pass
            ? `Expected function not to throw ${expected.name}`
            : `Expected function to throw ${expected.name}, but it threw ${
                error instanceof Error ? error.constructor.name : typeof error
              }`,
      };
    }
  },
});
