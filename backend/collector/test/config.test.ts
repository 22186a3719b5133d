import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';

const requiredEnv = {
  ESI_CLIENT_ID: 'test-client',
  ESI_CLIENT_SECRET: 'test-secret',
  ESI_CALLBACK_URL: 'http://localhost:3000/auth/callback',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(requiredEnv)).toEqual({
      host: '0.0.0.0',
      port: 3000,
      esi: {
        clientId: 'test-client',
        clientSecret: 'test-secret',
        callbackUrl: 'http://localhost:3000/auth/callback',
        timeoutMs: 10_000,
      },
      queueCapacity: 100,
      refreshIntervalMs: 300_000,
      fetchIntervalMs: 600_000,
      resolveIntervalMs: 3_600_000,
      refreshWindowMs: 600_000,
      refreshAllAccounts: false,
      secureCookies: false,
      logLevel: 'info',
      logPretty: false,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      ...requiredEnv,
      PORT: '8080',
      QUEUE_CAPACITY: '5',
      REFRESH_INTERVAL_MS: '1000',
      FETCH_INTERVAL_MS: '2000',
      RESOLVE_INTERVAL_MS: '3000',
      REFRESH_WINDOW_MS: '0',
      REFRESH_ALL_ACCOUNTS: 'true',
      ESI_TIMEOUT_MS: '2500',
      LOG_LEVEL: 'debug',
    });

    expect(config).toMatchObject({
      port: 8080,
      queueCapacity: 5,
      refreshIntervalMs: 1000,
      fetchIntervalMs: 2000,
      resolveIntervalMs: 3000,
      refreshWindowMs: 0,
      refreshAllAccounts: true,
      logLevel: 'debug',
    });
    expect(config.esi.timeoutMs).toBe(2500);
  });

  it('requires the SSO client settings', () => {
    expect(() => loadConfig({})).toThrow();
    expect(() => loadConfig({ ...requiredEnv, ESI_CALLBACK_URL: 'not a url' })).toThrow();
  });

  it('rejects a non-numeric queue capacity', () => {
    expect(() => loadConfig({ ...requiredEnv, QUEUE_CAPACITY: 'many' })).toThrow();
  });
});
