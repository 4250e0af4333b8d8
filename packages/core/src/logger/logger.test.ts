import { createLogger, resolveLogLevel, isLogLevel } from './logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation();
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('resolveLogLevel', () => {
    it('[L-A1] should prefer the explicit level over the environment', () => {
      expect(resolveLogLevel('debug', { NODE_ENV: 'test', LOG_LEVEL: 'error' })).toBe('debug');
    });

    it('[L-A2] should be silent under NODE_ENV=test', () => {
      expect(resolveLogLevel(undefined, { NODE_ENV: 'test', LOG_LEVEL: 'debug' })).toBe('silent');
    });

    it('[L-A3] should read LOG_LEVEL case-insensitively', () => {
      expect(resolveLogLevel(undefined, { LOG_LEVEL: 'WARN' })).toBe('warn');
    });

    it('[L-A4] should fall back to info for unknown or missing LOG_LEVEL', () => {
      expect(resolveLogLevel(undefined, { LOG_LEVEL: 'loud' })).toBe('info');
      expect(resolveLogLevel(undefined, {})).toBe('info');
    });
  });

  describe('isLogLevel', () => {
    it('[L-B1] should accept known levels only', () => {
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });

  describe('createLogger', () => {
    it('[L-C1] should prefix messages and route levels to the matching console method', () => {
      const log = createLogger('[Test] ', 'debug');

      log.debug('d');
      log.info('i', { a: 1 });
      log.warn('w');
      log.error('e');

      expect(logSpy).toHaveBeenNthCalledWith(1, '[Test] d');
      expect(logSpy).toHaveBeenNthCalledWith(2, '[Test] i', { a: 1 });
      expect(warnSpy).toHaveBeenCalledWith('[Test] w');
      expect(errorSpy).toHaveBeenCalledWith('[Test] e');
    });

    it('[L-C2] should drop messages below the configured level', () => {
      const log = createLogger('', 'warn');

      log.debug('hidden');
      log.info('hidden');
      log.warn('shown');

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('shown');
    });

    it('[L-C3] should print nothing when silent', () => {
      const log = createLogger('', 'silent');

      log.error('nope');

      expect(errorSpy).not.toHaveBeenCalled();
    });
  });
});
