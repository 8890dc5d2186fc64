/**
 * Metals.live Adapter
 * ===================
 *
 * GET https://api.metals.live/v1/spot/gold  (header x-api-key)
 * → { rates: { XAU: { price, timestamp? } } }
 *
 * Gold only. The payload may omit a timestamp; receipt time is used then.
 */

import type { AxiosInstance } from 'axios';
import type { Clock } from '../../shared/runtime/host.deps.js';
import type { SymbolEntry } from '../symbol.registry.js';
import { ProviderError, isRecord, secondsToMs, toFiniteNumber, type RawQuote } from './adapter.types.js';
import { BaseHttpAdapter } from './base.adapter.js';
import { createHttpClient } from './http.client.js';

const METALS_LIVE_BASE = 'https://api.metals.live/v1';

export function parseMetalsLiveQuote(data: unknown, now: number): RawQuote {
  const rates = isRecord(data) ? data.rates : undefined;
  const xau = isRecord(rates) ? rates.XAU : undefined;
  if (!isRecord(xau)) {
    throw new ProviderError('metals_live', 'malformed', 'missing rates.XAU');
  }

  const price = toFiniteNumber(xau.price);
  if (price === null) {
    throw new ProviderError('metals_live', 'malformed', 'missing rates.XAU.price');
  }

  return {
    price,
    timestamp: secondsToMs(xau.timestamp) ?? now,
    currency: 'USD',
  };
}

export class MetalsLiveAdapter extends BaseHttpAdapter {
  readonly id = 'metals_live' as const;

  static create(apiKey: string, timeoutMs: number, clock?: Clock): MetalsLiveAdapter {
    const client = createHttpClient({
      baseURL: METALS_LIVE_BASE,
      timeout: timeoutMs,
      headers: { 'x-api-key': apiKey },
    });
    return new MetalsLiveAdapter(client, clock);
  }

  constructor(client: AxiosInstance, clock?: Clock) {
    super(client, clock);
  }

  supports(entry: SymbolEntry): boolean {
    return entry.class === 'gold' && entry.quote === 'USD';
  }

  protected async request(_entry: SymbolEntry, signal: AbortSignal): Promise<unknown> {
    const res = await this.client.get<unknown>('/spot/gold', { signal });
    return res.data;
  }

  protected parse(data: unknown): RawQuote {
    return parseMetalsLiveQuote(data, this.clock.now());
  }
}
