import { afterEach, describe, expect, it } from 'vitest';
import logger, { getAvailableLogLevels, getLogLevel, isLogLevel, setLogLevel } from '../src/logger.js';
import metrics, { LOG_MESSAGES_METRIC } from '../src/metrics/index.js';

describe('logger', () => {
  const initialLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(initialLevel);
  });

  it('starts at the configured level', () => {
    expect(initialLevel).toBe('silent');
  });

  it('lists the pino levels', () => {
    expect(getAvailableLogLevels()).toEqual(['debug', 'error', 'fatal', 'info', 'trace', 'warn']);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('normalizes and applies a new level', () => {
    expect(setLogLevel('  ERROR ')).toBe('error');
    expect(logger.level).toBe('error');
  });

  it('rejects unknown levels', () => {
    expect(() => setLogLevel('loud')).toThrow('Unknown log level "loud"');
    expect(getLogLevel()).toBe(initialLevel);
  });

  it('counts emitted messages per level', () => {
    setLogLevel('fatal');
    const before = metrics.get(LOG_MESSAGES_METRIC, ['fatal']) ?? 0;

    logger.fatal('log counter check');
    logger.error('suppressed below the active level');

    expect(metrics.get(LOG_MESSAGES_METRIC, ['fatal'])).toBe(before + 1);
  });
});
