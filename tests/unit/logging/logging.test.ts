import { describe, expect, it } from 'vitest';
import { PinoLoggerFactory, isLogLevel, logLevelFromEnv } from '../../../src/core/logging/index.js';

describe('logLevelFromEnv', () => {
  it('reads the level case-insensitively', () => {
    expect(logLevelFromEnv({ RECTREE_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('stays silent by default or on unknown levels', () => {
    expect(logLevelFromEnv({})).toBe('silent');
    expect(logLevelFromEnv({ RECTREE_LOG_LEVEL: 'loud' })).toBe('silent');
  });
});

describe('isLogLevel', () => {
  it('accepts pino levels only', () => {
    expect(isLogLevel('trace')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('PinoLoggerFactory', () => {
  it('binds the component to child loggers', () => {
    const logger = new PinoLoggerFactory().create('ContainerRegistry');
    expect(logger.bindings()).toEqual({ component: 'ContainerRegistry' });
  });
});
