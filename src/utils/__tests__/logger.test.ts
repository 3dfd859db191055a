/**
 * logger Tests
 */

import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';

import { createLogger, getLogLevel, isLogLevel, setLogLevel } from '../logger';

describe('logger', () => {
  let previousEnv: string | undefined;

  beforeEach(() => {
    previousEnv = process.env.NODE_ENV;
    setLogLevel('debug');
  });

  afterEach(() => {
    process.env.NODE_ENV = previousEnv;
    setLogLevel('error');
    jest.restoreAllMocks();
  });

  test('routes levels to the matching console method', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('test');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e', {}, new Error('cause'));

    expect(log).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toContain('| Error: cause');
  });

  test('drops entries below the minimum level', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('warn');

    createLogger('test').info('hidden');

    expect(getLogLevel()).toBe('warn');
    expect(log).not.toHaveBeenCalled();
  });

  test('writes JSON lines in production', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    process.env.NODE_ENV = 'production';

    createLogger('market').child('vault').info('held', { amount: 3 });

    const entry: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'info',
      scope: 'market:vault',
      message: 'held',
      context: { amount: 3 },
    });
  });

  test('isLogLevel recognises the four levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
