import { AppFailure, matchFailure } from '../../domain/failures';

/**
 * The message a screen shows for a failure.
 */
export function describeFailure(failure: AppFailure): string {
  return matchFailure(failure, {
    server: () => 'Something went wrong on our side. Please try again later.',
    network: () => 'You appear to be offline. Check your connection and try again.',
    cache: () => 'Nothing has been saved on this device yet.',
    'not-found': () => 'We could not find what you were looking for.',
    unauthorized: () => 'Please sign in to continue.',
    validation: (f) => {
      const fields = Object.keys(f.errors);
      return fields.length > 0 ? `Please check: ${fields.join(', ')}.` : f.message;
    },
    unexpected: () => 'An unexpected error occurred.',
  });
}
