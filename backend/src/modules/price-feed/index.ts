/**
 * Price Feed Module Index
 */

import type { Env } from '../../config/env.js';
import type { Clock, Logger } from '../shared/runtime/host.deps.js';
import { loadPriceBands } from './price-bands.loader.js';
import { PriceCache } from './price.cache.js';
import { PriceValidator } from './price.validator.js';
import { PriceFeedAggregator } from './price-feed.aggregator.js';
import { createAdapters } from './providers/index.js';

export { PriceFeedAggregator } from './price-feed.aggregator.js';
export { PriceCache } from './price.cache.js';
export { PriceValidator } from './price.validator.js';
export { registerPriceFeedRoutes, serializePrice } from './price-feed.routes.js';
export { lookupSymbol, normalizeSymbol, listSymbols } from './symbol.registry.js';
export type * from './price-feed.types.js';

/**
 * Wire the price feed from environment config
 */
export function createPriceFeed(env: Env, logger: Logger, clock?: Clock): PriceFeedAggregator {
  const rank = {
    gold: env.PRICE_PROVIDERS_GOLD,
    forex: env.PRICE_PROVIDERS_FOREX,
  };

  const adapters = createAdapters(
    [...rank.gold, ...rank.forex],
    {
      goldApiToken: env.GOLD_API_TOKEN,
      metalsApiKey: env.METALS_API_KEY,
      forexApiKey: env.FOREX_API_KEY,
    },
    env.PRICE_ADAPTER_TIMEOUT_MS,
    logger,
    clock
  );

  const validator = new PriceValidator({
    bands: loadPriceBands(env.PRICE_BANDS_PATH),
    maxClockSkewMs: env.PRICE_MAX_CLOCK_SKEW_MS,
    maxSampleAgeMs: env.PRICE_MAX_SAMPLE_AGE_MS,
  });

  const cache = new PriceCache({ graceMs: env.PRICE_CACHE_GRACE_MS, clock, logger });

  logger.info(
    { gold: rank.gold, forex: rank.forex, active: adapters.map(a => a.id) },
    'Price feed initialized'
  );

  return new PriceFeedAggregator({
    adapters,
    rank,
    validator,
    cache,
    ttlMs: env.PRICE_CACHE_TTL_MS,
    adapterTimeoutMs: env.PRICE_ADAPTER_TIMEOUT_MS,
    clock,
    logger,
  });
}
