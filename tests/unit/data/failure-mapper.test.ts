/**
 * @fileoverview Unit tests for exception → failure mapping
 */

import {
  CacheException,
  CacheFailure,
  createDefaultFailureMapper,
  createFailureMapper,
  EntityValidationError,
  FailureMapperChain,
  FormatException,
  NetworkException,
  NotFoundFailure,
  ServerException,
  ServerFailure,
  TimeoutException,
  UnauthorizedFailure,
} from '../../../src';

describe('Data exceptions', () => {
  it('should carry their class name and default messages', () => {
    const server = new ServerException(502);
    const timeout = new TimeoutException(undefined, 250);

    expect(server.name).toBe('ServerException');
    expect(server.message).toBe('Server responded with status 502');
    expect(timeout).toBeInstanceOf(NetworkException);
    expect(timeout.name).toBe('TimeoutException');
    expect(timeout.message).toBe('Request timed out');
    expect(timeout.timeoutMs).toBe(250);
    expect(new CacheException().message).toBe('Local storage error');
  });
});

describe('Default failure mapper', () => {
  const mapper = createDefaultFailureMapper();

  describe('server exceptions', () => {
    it('should map 404 to not-found', () => {
      const failure = mapper.map(new ServerException(404, 'No article 7'));

      expect(failure).toBeInstanceOf(NotFoundFailure);
      expect(failure.message).toBe('No article 7');
    });

    it('should map 401 and 403 to unauthorized', () => {
      expect(mapper.map(new ServerException(401))).toBeInstanceOf(UnauthorizedFailure);
      expect(mapper.map(new ServerException(403))).toBeInstanceOf(UnauthorizedFailure);
    });

    it('should keep status and body for other statuses', () => {
      const failure = mapper.map(new ServerException(500, 'Boom', { code: 'E1' }));

      expect(failure).toBeInstanceOf(ServerFailure);
      expect(failure).toMatchObject({
        kind: 'server',
        message: 'Boom',
        statusCode: 500,
        details: { body: { code: 'E1' } },
      });
    });

    it('should leave details out without a body', () => {
      expect(mapper.map(new ServerException(503)).details).toBeUndefined();
    });
  });

  it('should map format exceptions to server failures with issues', () => {
    const failure = mapper.map(new FormatException('Invalid payload', { id: ['Required'] }));

    expect(failure).toMatchObject({
      kind: 'server',
      message: 'Invalid payload',
      details: { issues: { id: ['Required'] } },
    });
  });

  it('should map cache exceptions to cache failures', () => {
    const failure = mapper.map(new CacheException('Disk full'));

    expect(failure).toBeInstanceOf(CacheFailure);
    expect(failure.message).toBe('Disk full');
  });

  it('should map entity validation errors to validation failures', () => {
    const failure = mapper.map(new EntityValidationError('Article', ['title must not be empty']));

    expect(failure).toMatchObject({
      kind: 'validation',
      message: 'Invalid Article: title must not be empty',
      errors: { Article: ['title must not be empty'] },
    });
  });

  describe('connectivity', () => {
    it('should map network and timeout exceptions', () => {
      expect(mapper.map(new NetworkException('offline'))).toMatchObject({
        kind: 'network',
        message: 'offline',
      });
      expect(mapper.map(new TimeoutException()).kind).toBe('network');
    });

    it('should recognise errors from other clients by name, code or message', () => {
      const abort = new Error('aborted');
      abort.name = 'AbortError';
      const refused = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });

      expect(mapper.map(abort).kind).toBe('network');
      expect(mapper.map(refused).kind).toBe('network');
      expect(mapper.map(new Error('Socket timeout after 5s')).kind).toBe('network');
    });

    it('should follow the cause chain', () => {
      const wrapped = new Error('fetch failed', {
        cause: Object.assign(new Error('getaddrinfo'), { code: 'ENOTFOUND' }),
      });

      expect(mapper.map(wrapped)).toMatchObject({ kind: 'network', message: 'fetch failed' });
    });
  });

  it('should turn anything else into an unexpected failure', () => {
    expect(mapper.map(new TypeError('x is undefined'))).toMatchObject({
      kind: 'unexpected',
      message: 'An unexpected error occurred',
      details: { error: 'x is undefined' },
    });
    expect(mapper.map('a string')).toMatchObject({
      kind: 'unexpected',
      details: { error: 'a string' },
    });
  });
});

describe('FailureMapperChain', () => {
  class QuotaError extends Error {}

  const quotaMapper = createFailureMapper((error) =>
    error instanceof QuotaError ? new CacheFailure('Device storage is full') : undefined,
  );

  it('should consult added mappers in order', () => {
    const chain = new FailureMapperChain().addMapper(quotaMapper);

    expect(chain.map(new QuotaError())).toEqual(new CacheFailure('Device storage is full'));
    expect(chain.map(new ServerException(404)).kind).toBe('unexpected');
  });

  it('should let a prepended mapper take precedence', () => {
    const chain = createDefaultFailureMapper().prependMapper(
      createFailureMapper((error) =>
        error instanceof ServerException ? new ServerFailure('Overridden') : undefined,
      ),
    );

    expect(chain.map(new ServerException(404)).message).toBe('Overridden');
  });
});
