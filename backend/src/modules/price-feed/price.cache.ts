/**
 * PRICE CACHE
 * ===========
 *
 * TTL cache of the last validated sample per symbol, with single-flight refresh
 * and a bounded stale-if-error window.
 *
 * States per symbol (age measured from fetchedAt):
 * - fresh  (age < ttl)    → served directly, no provider call
 * - stale  (age >= ttl)   → refresh; if the refresh fails and age < grace,
 *                           the old sample is served tagged stale
 * - dead   (age >= grace) → refresh; failure surfaces PriceUnavailable
 *
 * Concurrency: the only "am I the one refreshing" decision is the coalescer
 * lookup, which happens synchronously. The refresh itself runs unlocked and
 * late joiners await the same promise. Refreshes are shared by every waiter,
 * so no single caller can cancel one.
 */

import { PriceUnavailableError } from '../../common/errors.js';
import { RequestCoalescer } from '../shared/runtime/request-coalescer.js';
import { defaultClock, defaultLogger, type Clock, type Logger } from '../shared/runtime/host.deps.js';
import type { CacheEntry, PriceSample, ResolvedPrice } from './price-feed.types.js';

export interface PriceCacheOptions {
  graceMs: number;
  clock?: Clock;
  logger?: Logger;
}

export interface PriceCacheStats {
  size: number;
  hits: number;
  misses: number;
  refreshes: number;
  staleServed: number;
  inFlight: string[];
}

export class PriceCache {
  private entries = new Map<string, CacheEntry>();
  private coalescer = new RequestCoalescer<ResolvedPrice>();
  private readonly graceMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private hits = 0;
  private misses = 0;
  private refreshes = 0;
  private staleServed = 0;

  constructor(options: PriceCacheOptions) {
    this.graceMs = options.graceMs;
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? defaultLogger;
  }

  async getOrRefresh(
    symbol: string,
    ttlMs: number,
    refreshFn: () => Promise<PriceSample>
  ): Promise<ResolvedPrice> {
    const fresh = this.getFresh(symbol, ttlMs);
    if (fresh) {
      this.hits++;
      return fresh;
    }

    this.misses++;
    return this.coalescer.run(symbol, () => this.refresh(symbol, ttlMs, refreshFn));
  }

  private async refresh(
    symbol: string,
    ttlMs: number,
    refreshFn: () => Promise<PriceSample>
  ): Promise<ResolvedPrice> {
    // A refresh that finished between the caller's check and now already stored a fresh sample
    const fresh = this.getFresh(symbol, ttlMs);
    if (fresh) return fresh;

    this.refreshes++;
    try {
      const sample = await refreshFn();
      return this.store(symbol, sample);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const entry = this.entries.get(symbol);
      const ageMs = entry ? this.clock.now() - entry.fetchedAt : Infinity;

      if (entry && ageMs < this.graceMs) {
        this.staleServed++;
        this.logger.warn({ symbol, ageMs, source: entry.sample.source, error: message }, 'Refresh failed, serving stale price within grace window');
        return { sample: entry.sample, fetchedAt: entry.fetchedAt, stale: true, cached: true };
      }

      if (err instanceof PriceUnavailableError) throw err;
      throw new PriceUnavailableError(symbol, message);
    }
  }

  private getFresh(symbol: string, ttlMs: number): ResolvedPrice | null {
    const entry = this.entries.get(symbol);
    if (!entry) return null;
    if (this.clock.now() - entry.fetchedAt >= ttlMs) return null;
    return { sample: entry.sample, fetchedAt: entry.fetchedAt, stale: false, cached: true };
  }

  private store(symbol: string, sample: PriceSample): ResolvedPrice {
    const previous = this.entries.get(symbol);
    // fetchedAt never moves backwards, even if the clock does
    const fetchedAt = Math.max(this.clock.now(), previous?.fetchedAt ?? 0);
    this.entries.set(symbol, { sample, fetchedAt });
    return { sample, fetchedAt, stale: false, cached: false };
  }

  peek(symbol: string): CacheEntry | undefined {
    const entry = this.entries.get(symbol);
    return entry ? { ...entry } : undefined;
  }

  isRefreshing(symbol: string): boolean {
    return this.coalescer.isInFlight(symbol);
  }

  stats(): PriceCacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      refreshes: this.refreshes,
      staleServed: this.staleServed,
      inFlight: this.coalescer.keys(),
    };
  }
}
