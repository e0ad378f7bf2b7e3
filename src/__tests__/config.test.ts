import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../config.js';
import { ConfigurationError } from '../motors/errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'warn', precision: 4 });
    expect(loadConfig({ MOTORCALC_LOG_LEVEL: '', MOTORCALC_PRECISION: '' })).toEqual(DEFAULT_CONFIG);
  });

  it('reads the environment', () => {
    expect(loadConfig({ MOTORCALC_LOG_LEVEL: 'debug', MOTORCALC_PRECISION: '6' })).toEqual({
      logLevel: 'debug',
      precision: 6
    });
  });

  it('rejects unknown levels and bad precision', () => {
    expect(() => loadConfig({ MOTORCALC_LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ MOTORCALC_PRECISION: '2.5' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ MOTORCALC_PRECISION: '13' })).toThrow(/Invalid configuration: precision/);
  });
});
