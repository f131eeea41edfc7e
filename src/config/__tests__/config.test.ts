import { afterEach, describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG, LOG_LEVEL_ENV, getConfig, loadConfig, resetConfig, useDefaultConfig } from '../index.js';
import { ConfigurationError } from '../../core/errors.js';

afterEach(() => {
  vi.unstubAllEnvs();
  resetConfig();
});

describe('loadConfig', () => {
  it('defaults the log level to warn', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'warn' });
    expect(DEFAULT_CONFIG.logLevel).toBe('warn');
  });

  it('treats an empty variable as unset', () => {
    expect(loadConfig({ [LOG_LEVEL_ENV]: '  ' }).logLevel).toBe('warn');
  });

  it('normalizes case and surrounding whitespace', () => {
    expect(loadConfig({ [LOG_LEVEL_ENV]: ' DEBUG ' }).logLevel).toBe('debug');
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({ [LOG_LEVEL_ENV]: 'info' }))).toBe(true);
  });

  it('rejects unknown levels', () => {
    expect(() => loadConfig({ [LOG_LEVEL_ENV]: 'verbose' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ [LOG_LEVEL_ENV]: 'verbose' })).toThrow(
      'Configuration error for INI_ROUNDTRIP_LOG_LEVEL: expected one of silent, error, warn, info, debug, got "verbose"',
    );
  });
});

describe('getConfig', () => {
  it('reads the environment once until reset', () => {
    vi.stubEnv(LOG_LEVEL_ENV, 'error');
    resetConfig();
    expect(getConfig().logLevel).toBe('error');

    vi.stubEnv(LOG_LEVEL_ENV, 'info');
    expect(getConfig().logLevel).toBe('error');

    resetConfig();
    expect(getConfig().logLevel).toBe('info');
  });
});

describe('useDefaultConfig', () => {
  it('stands in for an invalid environment until reset', () => {
    vi.stubEnv(LOG_LEVEL_ENV, 'verbose');
    resetConfig();
    expect(() => getConfig()).toThrow(ConfigurationError);

    expect(useDefaultConfig()).toBe(DEFAULT_CONFIG);
    expect(getConfig().logLevel).toBe('warn');

    resetConfig();
    expect(() => getConfig()).toThrow(ConfigurationError);
  });
});
