/**
 * Yahoo Finance Chart Adapter
 * ===========================
 *
 * GET https://query1.finance.yahoo.com/v8/finance/chart/EURUSD=X?interval=1d&range=1d
 * → { chart: { result: [{ meta: { regularMarketPrice, regularMarketTime, currency } }], error } }
 *
 * Keyless. Gold is read from the COMEX front-month future (GC=F).
 */

import type { AxiosInstance } from 'axios';
import type { Clock } from '../../shared/runtime/host.deps.js';
import type { SymbolEntry } from '../symbol.registry.js';
import { ProviderError, isRecord, secondsToMs, toFiniteNumber, type RawQuote } from './adapter.types.js';
import { BaseHttpAdapter } from './base.adapter.js';
import { createHttpClient } from './http.client.js';

const YAHOO_BASE = 'https://query1.finance.yahoo.com/v8/finance';

export function parseYahooChartQuote(data: unknown, now: number): RawQuote {
  const chart = isRecord(data) ? data.chart : undefined;
  if (!isRecord(chart)) {
    throw new ProviderError('yahoo', 'malformed', 'missing chart');
  }
  if (isRecord(chart.error)) {
    const description = typeof chart.error.description === 'string' ? chart.error.description : 'chart error';
    throw new ProviderError('yahoo', 'http', description);
  }

  const results: unknown[] = Array.isArray(chart.result) ? chart.result : [];
  const result = results[0];
  const meta = isRecord(result) ? result.meta : undefined;
  if (!isRecord(meta)) {
    throw new ProviderError('yahoo', 'malformed', 'missing chart.result[0].meta');
  }

  const price = toFiniteNumber(meta.regularMarketPrice);
  if (price === null) {
    throw new ProviderError('yahoo', 'malformed', 'missing regularMarketPrice');
  }
  if (typeof meta.currency !== 'string') {
    throw new ProviderError('yahoo', 'malformed', 'missing currency');
  }

  return {
    price,
    timestamp: secondsToMs(meta.regularMarketTime) ?? now,
    currency: meta.currency,
  };
}

export class YahooChartAdapter extends BaseHttpAdapter {
  readonly id = 'yahoo' as const;

  static create(timeoutMs: number, clock?: Clock): YahooChartAdapter {
    return new YahooChartAdapter(createHttpClient({ baseURL: YAHOO_BASE, timeout: timeoutMs }), clock);
  }

  constructor(client: AxiosInstance, clock?: Clock) {
    super(client, clock);
  }

  supports(entry: SymbolEntry): boolean {
    return entry.yahooKey.length > 0;
  }

  protected async request(entry: SymbolEntry, signal: AbortSignal): Promise<unknown> {
    const res = await this.client.get<unknown>(`/chart/${encodeURIComponent(entry.yahooKey)}`, {
      params: { interval: '1d', range: '1d' },
      signal,
    });
    return res.data;
  }

  protected parse(data: unknown): RawQuote {
    return parseYahooChartQuote(data, this.clock.now());
  }
}
