import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  resetLogging,
} from '../../../src/logging/LoggerFactory.js';
import { resetLoggingConfig } from '../../../src/logging/config.js';
import { getEffectiveLevel, resetDebugRegistry } from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

describe('LoggerFactory', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
  });

  afterEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
    process.env = { ...originalEnv };
  });

  it('should take the global level from LOG_LEVEL', () => {
    process.env['LOG_LEVEL'] = 'DEBUG';
    initializeLogging();
    expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
  });

  it('should apply RELAY_DEBUG_COMPONENTS overrides', () => {
    process.env['RELAY_DEBUG_COMPONENTS'] = 'association:TRACE';
    initializeLogging();
    expect(getEffectiveLevel('association', LogLevel.INFO)).toBe(LogLevel.TRACE);
  });

  it('should cache one logger per component', () => {
    const first = getLogger('relay-engine');
    expect(getLogger('relay-engine')).toBe(first);
    expect(getLogger('poller')).not.toBe(first);
  });

  it('should keep handed-out loggers usable across re-initialization', () => {
    const logger = getLogger('ledger');
    initializeLogging();
    expect(() => logger.info('still works')).not.toThrow();
  });

  it('should change the level at runtime', () => {
    initializeLogging();
    setGlobalLevel(LogLevel.WARN);
    expect(getGlobalLevel()).toBe(LogLevel.WARN);
    expect(getLogger('relay-engine').isDebugEnabled()).toBe(false);
  });
});
