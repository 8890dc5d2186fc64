/**
 * Price Bands Loader
 * ==================
 *
 * Reads the per-symbol plausible bands from JSON:
 *   { "XAU/USD": { "min": 1000, "max": 10000 }, ... }
 * Relative paths resolve against the working directory.
 */

import fs from 'fs';
import path from 'path';
import { ConfigError } from '../../common/errors.js';
import type { PriceBand } from './price-feed.types.js';
import { normalizeSymbol } from './symbol.registry.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parsePriceBands(raw: unknown): Record<string, PriceBand> {
  if (!isRecord(raw)) {
    throw new ConfigError('Price bands must be a JSON object keyed by symbol');
  }

  const bands: Record<string, PriceBand> = {};
  for (const [key, value] of Object.entries(raw)) {
    const symbol = normalizeSymbol(key);
    if (!symbol) {
      throw new ConfigError(`Price bands: unknown symbol "${key}"`);
    }
    if (!isRecord(value) || typeof value.min !== 'number' || typeof value.max !== 'number') {
      throw new ConfigError(`Price bands: "${key}" needs numeric min and max`);
    }
    if (!(value.min > 0) || !(value.max > value.min)) {
      throw new ConfigError(`Price bands: "${key}" needs 0 < min < max`);
    }
    bands[symbol] = { min: value.min, max: value.max };
  }
  return bands;
}

export function loadPriceBands(filePath: string): Record<string, PriceBand> {
  const resolved = path.resolve(process.cwd(), filePath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read price bands at ${resolved}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Price bands at ${resolved} are not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const bands = parsePriceBands(json);
  console.log(`[PriceFeed] Loaded ${Object.keys(bands).length} price bands from ${resolved}`);
  return bands;
}
