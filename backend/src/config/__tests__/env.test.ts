import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../common/errors.js';
import { loadEnv } from '../env.js';

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv({});

    expect(env.PORT).toBe(8001);
    expect(env.STORE_DRIVER).toBe('mongo');
    expect(env.DB_NAME).toBe('market_commentary');
    expect(env.PRICE_CACHE_TTL_MS).toBe(900_000);
    expect(env.PRICE_CACHE_GRACE_MS).toBe(3_600_000);
    expect(env.PRICE_ADAPTER_TIMEOUT_MS).toBe(5_000);
    expect(env.PRICE_PROVIDERS_GOLD).toEqual(['goldapi', 'metals_live', 'fcsapi', 'yahoo']);
    expect(env.PRICE_PROVIDERS_FOREX).toEqual(['yahoo', 'fcsapi']);
    expect(env.QUOTA_LIMIT_BASIC).toBe(1);
    expect(env.QUOTA_LIMIT_PREMIUM).toBe(5);
    expect(env.RESERVATION_TIMEOUT_MS).toBe(300_000);
    expect(env.GOLD_API_TOKEN).toBeUndefined();
  });

  it('reads overrides and provider order', () => {
    const env = loadEnv({
      STORE_DRIVER: 'memory',
      PRICE_CACHE_TTL_SEC: '60',
      PRICE_CACHE_GRACE_SEC: '600',
      PRICE_PROVIDERS_GOLD: 'yahoo, goldapi',
      GOLD_API_TOKEN: ' test-token ',
      QUOTA_LIMIT_PREMIUM: '10',
    });

    expect(env.STORE_DRIVER).toBe('memory');
    expect(env.PRICE_CACHE_TTL_MS).toBe(60_000);
    expect(env.PRICE_CACHE_GRACE_MS).toBe(600_000);
    expect(env.PRICE_PROVIDERS_GOLD).toEqual(['yahoo', 'goldapi']);
    expect(env.GOLD_API_TOKEN).toBe('test-token');
    expect(env.QUOTA_LIMIT_PREMIUM).toBe(10);
  });

  it('requires the grace window to exceed the TTL', () => {
    expect(() => loadEnv({ PRICE_CACHE_TTL_SEC: '900', PRICE_CACHE_GRACE_SEC: '900' })).toThrow(ConfigError);
  });

  it('rejects unknown providers and drivers', () => {
    expect(() => loadEnv({ PRICE_PROVIDERS_FOREX: 'yahoo,bloomberg' })).toThrow(
      'PRICE_PROVIDERS_FOREX: unknown provider "bloomberg"'
    );
    expect(() => loadEnv({ STORE_DRIVER: 'redis' })).toThrow(ConfigError);
  });

  it('rejects malformed integers', () => {
    expect(() => loadEnv({ QUOTA_LIMIT_BASIC: 'one' })).toThrow('QUOTA_LIMIT_BASIC must be an integer >= 0, got "one"');
    expect(() => loadEnv({ PORT: '0' })).toThrow(ConfigError);
  });
});
