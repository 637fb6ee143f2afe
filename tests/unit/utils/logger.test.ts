/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger, isLogLevel } from '../../../src/utils/logger.js';

describe('Logger', () => {
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    // Reset singleton state
    logger.setLevel('info');
    logger.setPrefix('');
  });

  describe('log levels', () => {
    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(String(errorSpy.mock.calls[0]?.[0])).toContain('[DEBUG] test message');
    });

    it('should not log debug when level is info', () => {
      const log = new Logger();

      log.debug('test message');

      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should not log info when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('test message');

      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should log nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('test message');

      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should print data on a second line', () => {
      const log = new Logger();

      log.warn('with data', { count: 2 });

      expect(errorSpy).toHaveBeenCalledTimes(2);
      expect(String(errorSpy.mock.calls[1]?.[0])).toContain('"count": 2');
    });
  });

  describe('child', () => {
    it('should join prefixes', () => {
      const parent = new Logger();
      parent.setPrefix('app');
      const child = parent.child('loader');

      child.info('hello');

      expect(String(errorSpy.mock.calls[0]?.[0])).toContain('[INFO] [app:loader] hello');
    });

    it('should follow the parent level until given its own', () => {
      const parent = new Logger();
      const child = parent.child('x');

      parent.setLevel('debug');
      expect(child.getLevel()).toBe('debug');

      child.setLevel('error');
      expect(child.getLevel()).toBe('error');
      expect(parent.getLevel()).toBe('debug');
    });
  });

  describe('isLogLevel', () => {
    it('should accept known levels', () => {
      expect(isLogLevel('warn')).toBe(true);
      expect(isLogLevel('silent')).toBe(true);
    });

    it('should reject unknown levels', () => {
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel('toString')).toBe(false);
    });
  });
});
