import { createConsoleLogger, isLogLevel } from '../../../src/application/logging';

describe('createConsoleLogger', () => {
  let info: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    delete process.env.LOG_LEVEL;
  });

  it('should drop messages below the level', () => {
    const logger = createConsoleLogger({ level: 'warn', prefix: 'reader' });

    logger.info('hidden');
    logger.warn('cache is stale', 3);
    logger.error('boom');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] [reader] cache is stale', 3);
    expect(error).toHaveBeenCalledWith('[ERROR] [reader] boom');
  });

  it('should read the level from LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'ERROR';

    const logger = createConsoleLogger();
    logger.warn('hidden');
    logger.error('shown');

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[ERROR] shown');
  });

  it('should write nothing when silent', () => {
    const logger = createConsoleLogger({ level: 'silent' });

    logger.error('hidden');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(10)).toBe(false);
  });
});
