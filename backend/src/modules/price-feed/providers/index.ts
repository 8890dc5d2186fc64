/**
 * Price Adapters
 * ==============
 *
 * The adapter set is fixed configuration, not a plugin system:
 * createAdapter switches exhaustively over ProviderId.
 * An adapter whose credential is missing is left out, as an inactive API.
 */

import type { Clock, Logger } from '../../shared/runtime/host.deps.js';
import type { ProviderId } from '../price-feed.types.js';
import type { PriceAdapter } from './adapter.types.js';
import { FcsApiAdapter } from './fcsapi.adapter.js';
import { GoldApiAdapter } from './goldapi.adapter.js';
import { MetalsLiveAdapter } from './metals-live.adapter.js';
import { YahooChartAdapter } from './yahoo.adapter.js';

export * from './adapter.types.js';
export { FcsApiAdapter, parseFcsApiQuote } from './fcsapi.adapter.js';
export { GoldApiAdapter, parseGoldApiQuote } from './goldapi.adapter.js';
export { MetalsLiveAdapter, parseMetalsLiveQuote } from './metals-live.adapter.js';
export { YahooChartAdapter, parseYahooChartQuote } from './yahoo.adapter.js';

export interface AdapterCredentials {
  goldApiToken?: string;
  metalsApiKey?: string;
  forexApiKey?: string;
}

export function createAdapter(
  id: ProviderId,
  credentials: AdapterCredentials,
  timeoutMs: number,
  clock?: Clock
): PriceAdapter | null {
  switch (id) {
    case 'goldapi':
      return credentials.goldApiToken ? GoldApiAdapter.create(credentials.goldApiToken, timeoutMs, clock) : null;
    case 'metals_live':
      return credentials.metalsApiKey ? MetalsLiveAdapter.create(credentials.metalsApiKey, timeoutMs, clock) : null;
    case 'fcsapi':
      return credentials.forexApiKey ? FcsApiAdapter.create(credentials.forexApiKey, timeoutMs, clock) : null;
    case 'yahoo':
      return YahooChartAdapter.create(timeoutMs, clock);
  }
}

export function createAdapters(
  ids: Iterable<ProviderId>,
  credentials: AdapterCredentials,
  timeoutMs: number,
  logger: Logger,
  clock?: Clock
): PriceAdapter[] {
  const adapters: PriceAdapter[] = [];
  for (const id of new Set(ids)) {
    const adapter = createAdapter(id, credentials, timeoutMs, clock);
    if (adapter) {
      adapters.push(adapter);
    } else {
      logger.warn({ provider: id }, 'Price provider has no credential configured, leaving it out');
    }
  }
  return adapters;
}
