import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, logger, resolveLogLevel, setLogLevel } from '../../src/utils/logger';
import { ConfigurationError, parseEnv } from '../../src/config/env';

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('reaches service loggers created before the level changed', () => {
    const service = createLogger({ service: 'Assembler' });

    setLogLevel('debug');

    expect(logger.level).toBe('debug');
    expect(service.level).toBe('debug');
  });

  it('applies to service loggers created afterwards', () => {
    setLogLevel('warn');

    expect(createLogger({ service: 'ChunkProcessor' }).level).toBe('warn');
  });
});

describe('resolveLogLevel', () => {
  it('keeps a known level', () => {
    expect(resolveLogLevel('warn')).toBe('warn');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('falls back to info for a missing or unknown level', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
    expect(resolveLogLevel('verbose')).toBe('info');
  });

  it('leaves an unknown level for env validation to report', () => {
    expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });
});
