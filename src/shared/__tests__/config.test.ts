import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 8000,
      host: '0.0.0.0',
      originBaseUrl: 'https://www.nseindia.com',
      symbol: 'NIFTY',
      pollIntervalMs: 60_000,
      cookieTtlMs: 600_000,
      requestTimeoutMs: 10_000,
      logLevel: 'info',
      logToFile: false,
    });
  });

  it('reads and normalises overrides', () => {
    const config = loadConfig({
      PORT: '9100',
      ORIGIN_BASE_URL: 'https://origin.test/',
      OPTION_CHAIN_SYMBOL: ' banknifty ',
      POLL_INTERVAL_MS: '30000',
      LOG_LEVEL: 'DEBUG',
      LOG_TO_FILE: 'true',
    });

    expect(config.port).toBe(9100);
    expect(config.originBaseUrl).toBe('https://origin.test');
    expect(config.symbol).toBe('BANKNIFTY');
    expect(config.pollIntervalMs).toBe(30_000);
    expect(config.logLevel).toBe('debug');
    expect(config.logToFile).toBe(true);
  });

  it('treats blank numeric variables as unset', () => {
    expect(loadConfig({ PORT: '  ' }).port).toBe(8000);
  });

  it('lists every violation', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'abc', POLL_INTERVAL_MS: '10', LOG_LEVEL: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.violations).toContain('PORT must be an integer');
    expect(caught.violations).toContain('pollIntervalMs must not be less than 1000');
    expect(caught.violations).toContain(
      'logLevel must be one of the following values: error, warn, info, http, verbose, debug, silly',
    );
  });

  it.each(['yes', '1', 'on'])('rejects LOG_TO_FILE=%s instead of reading it as false', (value) => {
    let caught: unknown;
    try {
      loadConfig({ LOG_TO_FILE: value });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.violations).toEqual(['LOG_TO_FILE must be "true" or "false"']);
  });

  it('accepts LOG_TO_FILE in any case', () => {
    expect(loadConfig({ LOG_TO_FILE: 'TRUE' }).logToFile).toBe(true);
    expect(loadConfig({ LOG_TO_FILE: 'False' }).logToFile).toBe(false);
  });

  it('rejects a non-URL origin', () => {
    expect(() => loadConfig({ ORIGIN_BASE_URL: 'not a url' })).toThrow(ConfigError);
  });
});
