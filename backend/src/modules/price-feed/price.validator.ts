/**
 * Price Validator
 * ===============
 *
 * Rejects implausible samples before they reach the cache.
 * Checks run in order and the first failure wins:
 *   1. price is a finite positive number
 *   2. price is inside the symbol's configured band
 *   3. timestamp is not ahead of now beyond the clock-skew tolerance
 *   4. timestamp is not older than the maximum sample age
 *
 * Pure: no I/O, no logging. The aggregator decides what a rejection means.
 */

import type { PriceBand, PriceSample, ValidationResult } from './price-feed.types.js';

export interface PriceValidatorConfig {
  bands: Readonly<Record<string, PriceBand>>;
  maxClockSkewMs: number;
  maxSampleAgeMs: number;
}

export class PriceValidator {
  constructor(private readonly config: PriceValidatorConfig) {}

  validate(sample: PriceSample, now: number): ValidationResult {
    const { price, symbol, timestamp } = sample;

    if (typeof price !== 'number' || !Number.isFinite(price) || price <= 0) {
      return { ok: false, reason: 'NOT_POSITIVE_FINITE', detail: `price ${String(price)} is not a positive number` };
    }

    const band = this.config.bands[symbol];
    if (!band) {
      return { ok: false, reason: 'NO_BAND', detail: `no plausible band configured for ${symbol}` };
    }
    if (price < band.min || price > band.max) {
      return { ok: false, reason: 'OUT_OF_BAND', detail: `price ${price} outside [${band.min}, ${band.max}] for ${symbol}` };
    }

    if (timestamp - now > this.config.maxClockSkewMs) {
      return { ok: false, reason: 'FUTURE_TIMESTAMP', detail: `timestamp ${new Date(timestamp).toISOString()} is ${timestamp - now}ms ahead` };
    }

    if (this.config.maxSampleAgeMs > 0 && now - timestamp > this.config.maxSampleAgeMs) {
      return { ok: false, reason: 'TOO_OLD', detail: `timestamp ${new Date(timestamp).toISOString()} is ${now - timestamp}ms old` };
    }

    return { ok: true };
  }

  bandFor(symbol: string): PriceBand | undefined {
    return this.config.bands[symbol];
  }
}
