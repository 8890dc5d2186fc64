/**
 * FCS API Adapter
 * ===============
 *
 * GET https://fcsapi.com/api-v3/forex/latest?symbol=EUR/USD&access_key=...
 * → { status: true, response: [{ s: "EUR/USD", c: "1.0856", t: "1700000000" }] }
 * → { status: false, msg: "..." } on error
 *
 * Gold and forex; prices and times arrive as strings. Only the row whose
 * `s` matches the requested pair is used.
 */

import type { AxiosInstance } from 'axios';
import type { Clock } from '../../shared/runtime/host.deps.js';
import type { SymbolEntry } from '../symbol.registry.js';
import { ProviderError, isRecord, secondsToMs, toFiniteNumber, type RawQuote } from './adapter.types.js';
import { BaseHttpAdapter } from './base.adapter.js';
import { createHttpClient } from './http.client.js';

const FCSAPI_BASE = 'https://fcsapi.com/api-v3';

export function parseFcsApiQuote(data: unknown, entry: SymbolEntry, now: number): RawQuote {
  if (!isRecord(data)) {
    throw new ProviderError('fcsapi', 'malformed', 'response is not an object');
  }
  if (data.status === false) {
    throw new ProviderError('fcsapi', 'http', typeof data.msg === 'string' ? data.msg : 'request rejected');
  }

  const rows: unknown[] = Array.isArray(data.response) ? data.response : [];
  if (rows.length === 0) {
    throw new ProviderError('fcsapi', 'malformed', `empty response for ${entry.canonical}`);
  }

  const row = rows.find(r => isRecord(r) && r.s === entry.canonical);
  if (!isRecord(row)) {
    throw new ProviderError('fcsapi', 'malformed', `no row for ${entry.canonical}`);
  }

  const price = toFiniteNumber(row.c);
  if (price === null) {
    throw new ProviderError('fcsapi', 'malformed', 'missing close price');
  }

  return {
    price,
    timestamp: secondsToMs(row.t) ?? now,
    currency: entry.quote,
  };
}

export class FcsApiAdapter extends BaseHttpAdapter {
  readonly id = 'fcsapi' as const;

  static create(accessKey: string, timeoutMs: number, clock?: Clock): FcsApiAdapter {
    const client = createHttpClient({ baseURL: FCSAPI_BASE, timeout: timeoutMs });
    return new FcsApiAdapter(client, accessKey, clock);
  }

  constructor(client: AxiosInstance, private readonly accessKey: string, clock?: Clock) {
    super(client, clock);
  }

  supports(): boolean {
    return true;
  }

  protected async request(entry: SymbolEntry, signal: AbortSignal): Promise<unknown> {
    const res = await this.client.get<unknown>('/forex/latest', {
      params: { symbol: entry.canonical, access_key: this.accessKey },
      signal,
    });
    return res.data;
  }

  protected parse(data: unknown, entry: SymbolEntry): RawQuote {
    return parseFcsApiQuote(data, entry, this.clock.now());
  }
}
