/**
 * GoldAPI.io Adapter
 * ==================
 *
 * GET https://www.goldapi.io/api/XAU/USD  (header x-access-token)
 * → { metal, currency, price, timestamp (unix s), ... }  |  { error }
 *
 * Gold only.
 */

import type { AxiosInstance } from 'axios';
import type { Clock } from '../../shared/runtime/host.deps.js';
import type { SymbolEntry } from '../symbol.registry.js';
import { ProviderError, isRecord, secondsToMs, toFiniteNumber, type RawQuote } from './adapter.types.js';
import { BaseHttpAdapter } from './base.adapter.js';
import { createHttpClient } from './http.client.js';

const GOLDAPI_BASE = 'https://www.goldapi.io/api';

export function parseGoldApiQuote(data: unknown, now: number): RawQuote {
  if (!isRecord(data)) {
    throw new ProviderError('goldapi', 'malformed', 'response is not an object');
  }
  if (typeof data.error === 'string') {
    throw new ProviderError('goldapi', 'http', data.error);
  }

  const price = toFiniteNumber(data.price);
  if (price === null) {
    throw new ProviderError('goldapi', 'malformed', 'missing price');
  }

  return {
    price,
    timestamp: secondsToMs(data.timestamp) ?? now,
    currency: typeof data.currency === 'string' ? data.currency : 'USD',
  };
}

export class GoldApiAdapter extends BaseHttpAdapter {
  readonly id = 'goldapi' as const;

  static create(token: string, timeoutMs: number, clock?: Clock): GoldApiAdapter {
    const client = createHttpClient({
      baseURL: GOLDAPI_BASE,
      timeout: timeoutMs,
      headers: { 'x-access-token': token },
    });
    return new GoldApiAdapter(client, clock);
  }

  constructor(client: AxiosInstance, clock?: Clock) {
    super(client, clock);
  }

  supports(entry: SymbolEntry): boolean {
    return entry.class === 'gold';
  }

  protected async request(entry: SymbolEntry, signal: AbortSignal): Promise<unknown> {
    const res = await this.client.get<unknown>(`/${entry.base}/${entry.quote}`, { signal });
    return res.data;
  }

  protected parse(data: unknown): RawQuote {
    return parseGoldApiQuote(data, this.clock.now());
  }
}
