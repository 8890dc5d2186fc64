/**
 * Environment Config
 * ==================
 *
 * Parsed once from process.env (dotenv is loaded by server.ts).
 * Invalid values fail fast with ConfigError.
 */

import { ConfigError } from '../common/errors.js';
import { PROVIDER_IDS, type ProviderId } from '../modules/price-feed/price-feed.types.js';

export type StoreDriver = 'mongo' | 'memory';

export interface Env {
  NODE_ENV: string;
  PORT: number;
  HOST: string;
  LOG_LEVEL: string;
  CORS_ORIGINS: string;

  STORE_DRIVER: StoreDriver;
  MONGO_URL: string;
  DB_NAME: string;

  PRICE_CACHE_TTL_MS: number;
  PRICE_CACHE_GRACE_MS: number;
  PRICE_ADAPTER_TIMEOUT_MS: number;
  PRICE_MAX_CLOCK_SKEW_MS: number;
  PRICE_MAX_SAMPLE_AGE_MS: number;
  PRICE_PROVIDERS_GOLD: ProviderId[];
  PRICE_PROVIDERS_FOREX: ProviderId[];
  PRICE_BANDS_PATH: string;

  GOLD_API_TOKEN?: string;
  METALS_API_KEY?: string;
  FOREX_API_KEY?: string;

  QUOTA_LIMIT_BASIC: number;
  QUOTA_LIMIT_PREMIUM: number;
  RESERVATION_TIMEOUT_MS: number;
}

type Source = Record<string, string | undefined>;

// ═══════════════════════════════════════════════════════════════
// PARSERS
// ═══════════════════════════════════════════════════════════════

function str(source: Source, key: string, def: string): string {
  const val = source[key];
  return val === undefined || val.trim() === '' ? def : val.trim();
}

function optional(source: Source, key: string): string | undefined {
  const val = source[key]?.trim();
  return val ? val : undefined;
}

function int(source: Source, key: string, def: number, min = 0): number {
  const raw = source[key];
  if (raw === undefined || raw.trim() === '') return def;
  const num = Number(raw);
  if (!Number.isInteger(num) || num < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return num;
}

function providerList(source: Source, key: string, def: ProviderId[]): ProviderId[] {
  const raw = source[key];
  if (raw === undefined || raw.trim() === '') return def;

  const ids = raw.split(',').map(s => s.trim()).filter(Boolean);
  return ids.map(id => {
    const known = PROVIDER_IDS.find(p => p === id);
    if (!known) {
      throw new ConfigError(`${key}: unknown provider "${id}" (expected one of ${PROVIDER_IDS.join(', ')})`);
    }
    return known;
  });
}

function storeDriver(source: Source): StoreDriver {
  const raw = str(source, 'STORE_DRIVER', 'mongo');
  if (raw !== 'mongo' && raw !== 'memory') {
    throw new ConfigError(`STORE_DRIVER must be "mongo" or "memory", got "${raw}"`);
  }
  return raw;
}

// ═══════════════════════════════════════════════════════════════
// LOAD
// ═══════════════════════════════════════════════════════════════

export function loadEnv(source: Source = process.env): Env {
  const ttlSec = int(source, 'PRICE_CACHE_TTL_SEC', 900, 1);
  const graceSec = int(source, 'PRICE_CACHE_GRACE_SEC', 3600, 1);
  if (graceSec <= ttlSec) {
    throw new ConfigError(`PRICE_CACHE_GRACE_SEC (${graceSec}) must be greater than PRICE_CACHE_TTL_SEC (${ttlSec})`);
  }

  return Object.freeze({
    NODE_ENV: str(source, 'NODE_ENV', 'development'),
    PORT: int(source, 'PORT', 8001, 1),
    HOST: str(source, 'HOST', '0.0.0.0'),
    LOG_LEVEL: str(source, 'LOG_LEVEL', 'info'),
    CORS_ORIGINS: str(source, 'CORS_ORIGINS', '*'),

    STORE_DRIVER: storeDriver(source),
    MONGO_URL: str(source, 'MONGO_URL', 'mongodb://localhost:27017'),
    DB_NAME: str(source, 'DB_NAME', 'market_commentary'),

    PRICE_CACHE_TTL_MS: ttlSec * 1000,
    PRICE_CACHE_GRACE_MS: graceSec * 1000,
    PRICE_ADAPTER_TIMEOUT_MS: int(source, 'PRICE_ADAPTER_TIMEOUT_MS', 5000, 1),
    PRICE_MAX_CLOCK_SKEW_MS: int(source, 'PRICE_MAX_CLOCK_SKEW_SEC', 120) * 1000,
    PRICE_MAX_SAMPLE_AGE_MS: int(source, 'PRICE_MAX_SAMPLE_AGE_SEC', 4 * 24 * 3600) * 1000,
    PRICE_PROVIDERS_GOLD: providerList(source, 'PRICE_PROVIDERS_GOLD', ['goldapi', 'metals_live', 'fcsapi', 'yahoo']),
    PRICE_PROVIDERS_FOREX: providerList(source, 'PRICE_PROVIDERS_FOREX', ['yahoo', 'fcsapi']),
    PRICE_BANDS_PATH: str(source, 'PRICE_BANDS_PATH', 'backend/config/price-bands.json'),

    GOLD_API_TOKEN: optional(source, 'GOLD_API_TOKEN'),
    METALS_API_KEY: optional(source, 'METALS_API_KEY'),
    FOREX_API_KEY: optional(source, 'FOREX_API_KEY'),

    QUOTA_LIMIT_BASIC: int(source, 'QUOTA_LIMIT_BASIC', 1),
    QUOTA_LIMIT_PREMIUM: int(source, 'QUOTA_LIMIT_PREMIUM', 5),
    RESERVATION_TIMEOUT_MS: int(source, 'RESERVATION_TIMEOUT_SEC', 300, 1) * 1000,
  });
}

export const env: Env = loadEnv();
