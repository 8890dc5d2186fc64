/**
 * Base HTTP Adapter
 * =================
 *
 * Common fetch pipeline for HTTP price sources:
 *   supports? → request → parse → currency check → PriceSample
 *
 * Subclasses only know their endpoint and payload shape.
 */

import type { AxiosInstance } from 'axios';
import { defaultClock, type Clock } from '../../shared/runtime/host.deps.js';
import { createSample, type PriceSample, type ProviderId } from '../price-feed.types.js';
import type { SymbolEntry } from '../symbol.registry.js';
import { ProviderError, type PriceAdapter, type RawQuote } from './adapter.types.js';
import { toProviderError } from './http.client.js';

export abstract class BaseHttpAdapter implements PriceAdapter {
  abstract readonly id: ProviderId;

  constructor(
    protected readonly client: AxiosInstance,
    protected readonly clock: Clock = defaultClock
  ) {}

  abstract supports(entry: SymbolEntry): boolean;

  protected abstract request(entry: SymbolEntry, signal: AbortSignal): Promise<unknown>;

  protected abstract parse(data: unknown, entry: SymbolEntry): RawQuote;

  async fetch(entry: SymbolEntry, signal: AbortSignal): Promise<PriceSample> {
    if (!this.supports(entry)) {
      throw new ProviderError(this.id, 'unsupported', `${entry.canonical} is not served by ${this.id}`);
    }

    let data: unknown;
    try {
      data = await this.request(entry, signal);
    } catch (err) {
      throw toProviderError(this.id, err);
    }

    const quote = this.parse(data, entry);
    if (quote.currency.toUpperCase() !== entry.quote) {
      throw new ProviderError(this.id, 'malformed', `currency ${quote.currency} does not match ${entry.quote} for ${entry.canonical}`);
    }

    return createSample({
      symbol: entry.canonical,
      price: quote.price,
      currency: entry.quote,
      timestamp: quote.timestamp,
      source: this.id,
    });
  }
}
