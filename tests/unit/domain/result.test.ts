/**
 * @fileoverview Unit tests for Result values
 */

import { NetworkFailure, Result, Results, ServerFailure } from '../../../src';

type Outcome = Result<string, number>;

const ok = (value: number): Outcome => Results.success(value);
const fail = (failure: string): Outcome => Results.failure(failure);

describe('Results', () => {
  describe('construction', () => {
    it('should build frozen success and failure values', () => {
      const success = Results.success(1);
      const failure = Results.failure('bad');

      expect(success).toEqual({ success: true, value: 1 });
      expect(failure).toEqual({ success: false, failure: 'bad' });
      expect(Object.isFrozen(success)).toBe(true);
      expect(Object.isFrozen(failure)).toBe(true);
    });

    it('should narrow with isSuccess and isFailure', () => {
      const result = ok(3);

      expect(Results.isSuccess(result)).toBe(true);
      expect(Results.isFailure(result)).toBe(false);
      if (Results.isSuccess(result)) {
        expect(result.value).toBe(3);
      }
    });
  });

  describe('fold', () => {
    it('should call the arm that matches', () => {
      const render = (result: Outcome) =>
        Results.fold(
          result,
          (failure) => `failed: ${failure}`,
          (value) => `got ${value}`,
        );

      expect(render(ok(2))).toBe('got 2');
      expect(render(fail('offline'))).toBe('failed: offline');
    });
  });

  describe('map and mapFailure', () => {
    it('should transform only the matching arm', () => {
      expect(Results.map(ok(2), (v) => v * 10)).toBeSuccess(20);
      expect(Results.map(fail('x'), (v) => v * 10)).toEqual(Results.failure('x'));
      expect(Results.mapFailure(fail('x'), (f) => f.toUpperCase())).toEqual(
        Results.failure('X'),
      );
      expect(Results.mapFailure(ok(2), (f) => f.length)).toBeSuccess(2);
    });

    it('should return the same failure object untouched from map', () => {
      const failure = fail('x');

      expect(Results.map(failure, (v) => v + 1)).toBe(failure);
    });
  });

  describe('flatMap', () => {
    const half = (value: number): Outcome =>
      value % 2 === 0 ? ok(value / 2) : fail(`${value} is odd`);

    it('should chain successes', () => {
      expect(Results.flatMap(ok(8), half)).toBeSuccess(4);
    });

    it('should stop at the first failure', () => {
      expect(Results.flatMap(ok(3), half)).toEqual(Results.failure('3 is odd'));
      expect(Results.flatMap(fail('earlier'), half)).toEqual(Results.failure('earlier'));
    });

    it('should chain asynchronous steps', async () => {
      const result = await Results.flatMapAsync(ok(8), async (v) => half(v));

      expect(result).toBeSuccess(4);
    });
  });

  describe('getOrElse and tap', () => {
    it('should fall back on failure', () => {
      expect(Results.getOrElse(ok(1), () => 0)).toBe(1);
      expect(Results.getOrElse(fail('nope'), (f) => f.length)).toBe(4);
    });

    it('should run side effects on success only', () => {
      const seen: number[] = [];

      Results.tap(ok(5), (v) => seen.push(v));
      Results.tap(fail('x'), (v) => seen.push(v));

      expect(seen).toEqual([5]);
    });
  });

  describe('combine', () => {
    it('should collect every value in order', () => {
      expect(Results.combine([ok(1), ok(2), ok(3)])).toBeSuccess([1, 2, 3]);
    });

    it('should return the first failure', () => {
      expect(Results.combine([ok(1), fail('second'), fail('third')])).toEqual(
        Results.failure('second'),
      );
    });

    it('should succeed with an empty list', () => {
      expect(Results.combine<string, number>([])).toBeSuccess([]);
    });
  });

  describe('with failure values', () => {
    it('should carry domain failures', () => {
      const result: Result<NetworkFailure | ServerFailure, number> = Results.failure(
        new NetworkFailure(),
      );

      expect(result).toBeFailureOfKind('network');
      expect(result).not.toBeSuccess();
    });
  });
});
