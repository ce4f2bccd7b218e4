/**
 * @fileoverview Unit tests for the data-layer boundary
 */

import {
  createFailureMapper,
  FailureMapperChain,
  guardDataCall,
  ILogger,
  NotFoundFailure,
  ServerException,
  UnauthorizedFailure,
} from '../../../src';

function mockLogger(): jest.Mocked<ILogger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('guardDataCall', () => {
  let logger: jest.Mocked<ILogger>;

  beforeEach(() => {
    logger = mockLogger();
  });

  it('should wrap a synchronous value', async () => {
    await expect(guardDataCall(() => 3, { logger })).resolves.toBeSuccess(3);
  });

  it('should wrap an asynchronous value', async () => {
    await expect(guardDataCall(async () => 'ok', { logger })).resolves.toBeSuccess('ok');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should map thrown errors and log them', async () => {
    const result = await guardDataCall(
      () => {
        throw new ServerException(404, 'No article 7');
      },
      { logger, label: 'getArticle' },
    );

    expect(result).toBeFailureOfKind('not-found');
    expect(result).toEqual({ success: false, failure: new NotFoundFailure('No article 7') });
    expect(logger.warn).toHaveBeenCalledWith(
      'getArticle failed with not-found failure: No article 7',
    );
  });

  it('should map rejected promises', async () => {
    const result = await guardDataCall(() => Promise.reject(new Error('kaput')), { logger });

    expect(result).toBeFailureOfKind('unexpected');
    expect(logger.warn).toHaveBeenCalledWith('Data call failed with unexpected failure: kaput');
  });

  it('should use a custom mapper first', async () => {
    const mapper = createFailureMapper((error) =>
      error instanceof ServerException ? new UnauthorizedFailure('Sign in again') : undefined,
    );

    const result = await guardDataCall(
      () => {
        throw new ServerException(500);
      },
      { mapper, logger },
    );

    expect(result).toEqual({ success: false, failure: new UnauthorizedFailure('Sign in again') });
  });

  it('should fall back to the default mapping when a custom mapper passes', async () => {
    const result = await guardDataCall(
      () => {
        throw new ServerException(404);
      },
      { mapper: createFailureMapper(() => undefined), logger },
    );

    expect(result).toBeFailureOfKind('not-found');
  });

  it('should accept a mapper chain', async () => {
    const result = await guardDataCall(
      () => {
        throw new ServerException(404);
      },
      { mapper: new FailureMapperChain(), logger },
    );

    expect(result).toBeFailureOfKind('unexpected');
  });
});
