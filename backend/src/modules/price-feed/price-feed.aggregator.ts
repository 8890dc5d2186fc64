/**
 * PRICE FEED AGGREGATOR
 * =====================
 *
 * Public entry point for "give me the current price of X".
 *
 * resolve(symbol):
 *   cache first; on miss/stale, one refresh walks the ProviderRank for the
 *   symbol's class strictly in order. The first sample the validator accepts
 *   wins and no further adapter is called. Adapter errors and validator
 *   rejections both advance to the next adapter. No blending: the result is
 *   always attributable to a single source.
 *
 * Each adapter call has its own timeout, so a hung provider costs at most
 * adapterTimeoutMs before the chain moves on. No retries within one resolve.
 */

import { PriceUnavailableError, UnknownSymbolError } from '../../common/errors.js';
import { defaultClock, defaultLogger, type Clock, type Logger } from '../shared/runtime/host.deps.js';
import type { PriceCache, PriceCacheStats } from './price.cache.js';
import type { PriceValidator } from './price.validator.js';
import type {
  BulkPriceResult,
  PriceSample,
  ProbeResult,
  ProviderHealth,
  ProviderId,
  ProviderRank,
  ResolvedPrice,
  SymbolClass,
} from './price-feed.types.js';
import { ProviderHealthBoard } from './provider.health.js';
import { ProviderError, type PriceAdapter } from './providers/adapter.types.js';
import { toProviderError } from './providers/http.client.js';
import { listSymbols, lookupSymbol, type SymbolEntry } from './symbol.registry.js';

export interface PriceFeedAggregatorOptions {
  adapters: PriceAdapter[];
  rank: ProviderRank;
  validator: PriceValidator;
  cache: PriceCache;
  ttlMs: number;
  adapterTimeoutMs: number;
  clock?: Clock;
  logger?: Logger;
}

export class PriceFeedAggregator {
  private readonly adapters: Map<ProviderId, PriceAdapter>;
  private readonly rank: ProviderRank;
  private readonly validator: PriceValidator;
  private readonly cache: PriceCache;
  private readonly ttlMs: number;
  private readonly adapterTimeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly health: ProviderHealthBoard;

  constructor(options: PriceFeedAggregatorOptions) {
    this.adapters = new Map(options.adapters.map(a => [a.id, a]));
    this.rank = options.rank;
    this.validator = options.validator;
    this.cache = options.cache;
    this.ttlMs = options.ttlMs;
    this.adapterTimeoutMs = options.adapterTimeoutMs;
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? defaultLogger;
    this.health = new ProviderHealthBoard(this.adapters.keys());
  }

  // ─────────────────────────────────────────────────────────────
  // Resolve
  // ─────────────────────────────────────────────────────────────

  async resolve(symbol: string): Promise<ResolvedPrice> {
    const entry = this.lookup(symbol);
    return this.cache.getOrRefresh(entry.canonical, this.ttlMs, () => this.runChain(entry));
  }

  /**
   * Resolve every registered symbol (optionally one class) concurrently.
   * Per-symbol failures are reported, not thrown.
   */
  async resolveAll(symbolClass?: SymbolClass): Promise<BulkPriceResult[]> {
    return Promise.all(
      listSymbols(symbolClass).map(async (entry): Promise<BulkPriceResult> => {
        try {
          return { symbol: entry.canonical, ok: true, price: await this.resolve(entry.canonical) };
        } catch (err) {
          return { symbol: entry.canonical, ok: false, error: err instanceof Error ? err.message : String(err) };
        }
      })
    );
  }

  private lookup(symbol: string): SymbolEntry {
    const entry = lookupSymbol(symbol);
    if (!entry) throw new UnknownSymbolError(symbol);
    return entry;
  }

  /**
   * Adapters that will be tried for a symbol, in order
   */
  chainFor(entry: SymbolEntry): PriceAdapter[] {
    const chain: PriceAdapter[] = [];
    for (const id of this.rank[entry.class]) {
      const adapter = this.adapters.get(id);
      if (adapter && adapter.supports(entry)) chain.push(adapter);
    }
    return chain;
  }

  private async runChain(entry: SymbolEntry): Promise<PriceSample> {
    const chain = this.chainFor(entry);
    if (chain.length === 0) {
      throw new PriceUnavailableError(entry.canonical, 'no providers configured');
    }

    const failures: string[] = [];
    for (const adapter of chain) {
      let sample: PriceSample;
      try {
        sample = await this.callWithTimeout(adapter, entry);
      } catch (err) {
        const error = toProviderError(adapter.id, err);
        this.health.error(adapter.id, this.clock.now(), error.message);
        this.logger.warn({ provider: adapter.id, symbol: entry.canonical, kind: error.kind, error: error.message }, 'Price provider failed');
        failures.push(`${adapter.id}: ${error.kind}`);
        continue;
      }

      const verdict = this.validator.validate(sample, this.clock.now());
      if (!verdict.ok) {
        this.health.rejection(adapter.id, this.clock.now(), verdict.detail);
        this.logger.warn({ provider: adapter.id, symbol: entry.canonical, reason: verdict.reason, detail: verdict.detail }, 'Price sample rejected by validator');
        failures.push(`${adapter.id}: ${verdict.reason}`);
        continue;
      }

      this.health.success(adapter.id, this.clock.now());
      this.logger.info({ provider: adapter.id, symbol: entry.canonical, price: sample.price }, 'Price refreshed');
      return sample;
    }

    throw new PriceUnavailableError(entry.canonical, `all providers failed (${failures.join(', ')})`);
  }

  private async callWithTimeout(adapter: PriceAdapter, entry: SymbolEntry): Promise<PriceSample> {
    const ac = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        ac.abort();
        reject(new ProviderError(adapter.id, 'timeout', `no response within ${this.adapterTimeoutMs}ms`));
      }, this.adapterTimeoutMs);
    });

    try {
      return await Promise.race([adapter.fetch(entry, ac.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Probe & observability
  // ─────────────────────────────────────────────────────────────

  /**
   * Call every ranked adapter for a symbol directly, bypassing the cache.
   * Results never enter the cache.
   */
  async probe(symbol: string): Promise<ProbeResult[]> {
    const entry = this.lookup(symbol);
    const results: ProbeResult[] = [];

    for (const adapter of this.chainFor(entry)) {
      const startedAt = this.clock.now();
      try {
        const sample = await this.callWithTimeout(adapter, entry);
        const latencyMs = this.clock.now() - startedAt;
        const verdict = this.validator.validate(sample, this.clock.now());

        if (verdict.ok) {
          this.health.success(adapter.id, this.clock.now());
          results.push({ provider: adapter.id, ok: true, latencyMs, sample });
        } else {
          this.health.rejection(adapter.id, this.clock.now(), verdict.detail);
          results.push({ provider: adapter.id, ok: false, latencyMs, stage: 'validate', error: verdict.detail });
        }
      } catch (err) {
        const error = toProviderError(adapter.id, err);
        this.health.error(adapter.id, this.clock.now(), error.message);
        results.push({ provider: adapter.id, ok: false, latencyMs: this.clock.now() - startedAt, stage: 'fetch', error: error.message });
      }
    }

    return results;
  }

  providerHealth(): ProviderHealth[] {
    return this.health.snapshot();
  }

  cacheStats(): PriceCacheStats {
    return this.cache.stats();
  }
}
