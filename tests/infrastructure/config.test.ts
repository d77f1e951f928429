import { describe, it, expect } from 'vitest';
import { loadConfig, DEFAULT_CONFIG } from '../../src/infrastructure/config/index.js';
import { ConfigurationError } from '../../src/application/errors.js';

describe('loadConfig', () => {
  it('applies defaults when only the API key is set', () => {
    const config = loadConfig({ FLAGSYNC_API_KEY: 'test-secret' });

    expect(config).toEqual({ apiKey: 'test-secret', ...DEFAULT_CONFIG });
    expect(config.pollingIntervalMs).toBe(60_000);
    expect(config.flushIntervalMs).toBe(60_000);
    expect(config.flushBatchSize).toBe(500);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      FLAGSYNC_API_KEY: 'test-secret',
      FLAGSYNC_API_URL: 'http://localhost:8080/v1/',
      FLAGSYNC_POLLING_INTERVAL_MS: '15000',
      FLAGSYNC_FLUSH_INTERVAL_MS: '30000',
      FLAGSYNC_FLUSH_BATCH_SIZE: '100',
      FLAGSYNC_REQUEST_TIMEOUT_MS: '2500',
      LOG_LEVEL: 'debug',
      HOST: '127.0.0.1',
      PORT: '8081',
    });

    expect(config).toEqual({
      apiKey: 'test-secret',
      apiBaseUrl: 'http://localhost:8080/v1',
      pollingIntervalMs: 15000,
      flushIntervalMs: 30000,
      flushBatchSize: 100,
      requestTimeoutMs: 2500,
      logLevel: 'debug',
      host: '127.0.0.1',
      port: 8081,
    });
  });

  it('accepts an interval at the timer limit', () => {
    const config = loadConfig({ FLAGSYNC_API_KEY: 'test-secret', FLAGSYNC_POLLING_INTERVAL_MS: '2147483647' });
    expect(config.pollingIntervalMs).toBe(2_147_483_647);
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ FLAGSYNC_API_KEY: 'test-secret', FLAGSYNC_FLUSH_BATCH_SIZE: '  ' });
    expect(config.flushBatchSize).toBe(500);
  });

  it('requires the API key', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);

    try {
      loadConfig({ FLAGSYNC_API_KEY: '' });
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toEqual(['FLAGSYNC_API_KEY: Required']);
      }
    }
  });

  it.each([
    ['FLAGSYNC_FLUSH_BATCH_SIZE', 'lots'],
    ['FLAGSYNC_FLUSH_BATCH_SIZE', '0'],
    ['FLAGSYNC_POLLING_INTERVAL_MS', '-1'],
    ['FLAGSYNC_FLUSH_INTERVAL_MS', '1.5'],
    ['FLAGSYNC_POLLING_INTERVAL_MS', '3000000000'],
    ['FLAGSYNC_FLUSH_INTERVAL_MS', '2147483648'],
    ['FLAGSYNC_REQUEST_TIMEOUT_MS', '3000000000'],
    ['FLAGSYNC_API_URL', 'not a url'],
    ['LOG_LEVEL', 'verbose'],
    ['PORT', '70000'],
  ])('rejects %s=%s', (key, value) => {
    let caught: unknown;
    try {
      loadConfig({ FLAGSYNC_API_KEY: 'test-secret', [key]: value });
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0]?.startsWith(`${key}: `)).toBe(true);
    }
  });
});
