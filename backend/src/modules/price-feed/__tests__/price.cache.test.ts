import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PriceUnavailableError } from '../../../common/errors.js';
import { PriceCache } from '../price.cache.js';
import { createSample, type PriceSample } from '../price-feed.types.js';
import { manualClock, mockLogger, T0, type ManualClock } from './fixtures.js';

const TTL = 900_000;
const GRACE = 3_600_000;

function sample(price: number, timestamp = T0): PriceSample {
  return createSample({ symbol: 'XAU/USD', price, currency: 'USD', timestamp, source: 'goldapi' });
}

describe('PriceCache', () => {
  let clock: ManualClock;
  let logger: ReturnType<typeof mockLogger>;
  let cache: PriceCache;

  beforeEach(() => {
    clock = manualClock();
    logger = mockLogger();
    cache = new PriceCache({ graceMs: GRACE, clock, logger });
  });

  it('calls the refresh once for two reads within the TTL', async () => {
    const refresh = vi.fn().mockResolvedValue(sample(2650));

    const first = await cache.getOrRefresh('XAU/USD', TTL, refresh);
    clock.advance(TTL - 1);
    const second = await cache.getOrRefresh('XAU/USD', TTL, refresh);

    expect(refresh).toHaveBeenCalledTimes(1);
    expect(first).toEqual({ sample: sample(2650), fetchedAt: T0, stale: false, cached: false });
    expect(second).toEqual({ sample: sample(2650), fetchedAt: T0, stale: false, cached: true });
  });

  it('refreshes again once the TTL has elapsed', async () => {
    const refresh = vi.fn()
      .mockResolvedValueOnce(sample(2650))
      .mockResolvedValueOnce(sample(2655));

    await cache.getOrRefresh('XAU/USD', TTL, refresh);
    clock.advance(TTL);
    const result = await cache.getOrRefresh('XAU/USD', TTL, refresh);

    expect(refresh).toHaveBeenCalledTimes(2);
    expect(result.sample.price).toBe(2655);
    expect(result.fetchedAt).toBe(T0 + TTL);
  });

  it('runs one refresh for 50 concurrent readers and hands all of them the same sample', async () => {
    let release: (value: PriceSample) => void = () => undefined;
    const refresh = vi.fn(
      () => new Promise<PriceSample>(resolve => {
        release = resolve;
      })
    );

    const readers = Array.from({ length: 50 }, () => cache.getOrRefresh('XAU/USD', TTL, refresh));
    expect(cache.isRefreshing('XAU/USD')).toBe(true);

    release(sample(2650));
    const results = await Promise.all(readers);

    expect(refresh).toHaveBeenCalledTimes(1);
    const first = results[0];
    for (const result of results) {
      expect(result.sample).toBe(first?.sample);
    }
    expect(cache.isRefreshing('XAU/USD')).toBe(false);
  });

  it('refreshes symbols independently', async () => {
    const gold = vi.fn().mockResolvedValue(sample(2650));
    const euro = vi.fn().mockResolvedValue(
      createSample({ symbol: 'EUR/USD', price: 1.08, currency: 'USD', timestamp: T0, source: 'yahoo' })
    );

    await Promise.all([
      cache.getOrRefresh('XAU/USD', TTL, gold),
      cache.getOrRefresh('EUR/USD', TTL, euro),
    ]);

    expect(gold).toHaveBeenCalledTimes(1);
    expect(euro).toHaveBeenCalledTimes(1);
    expect(cache.stats().size).toBe(2);
  });

  it('serves the last sample marked stale when the refresh fails inside the grace window', async () => {
    await cache.getOrRefresh('XAU/USD', TTL, async () => sample(2650));
    clock.advance(TTL + 60_000);

    const result = await cache.getOrRefresh('XAU/USD', TTL, async () => {
      throw new Error('all providers down');
    });

    expect(result).toEqual({ sample: sample(2650), fetchedAt: T0, stale: true, cached: true });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(cache.stats().staleServed).toBe(1);
  });

  it('raises PriceUnavailable when the last sample is past the grace window', async () => {
    await cache.getOrRefresh('XAU/USD', TTL, async () => sample(2650));
    clock.advance(GRACE);

    await expect(
      cache.getOrRefresh('XAU/USD', TTL, async () => {
        throw new Error('all providers down');
      })
    ).rejects.toThrow('Price unavailable for XAU/USD: all providers down');
  });

  it('raises PriceUnavailable when there was never a sample', async () => {
    const error = await cache
      .getOrRefresh('XAU/USD', TTL, async () => {
        throw new PriceUnavailableError('XAU/USD', 'no providers configured');
      })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PriceUnavailableError);
    expect(error).toHaveProperty('message', 'Price unavailable for XAU/USD: no providers configured');
  });

  it('keeps the cached entry after a failed refresh', async () => {
    await cache.getOrRefresh('XAU/USD', TTL, async () => sample(2650));
    clock.advance(TTL);
    await cache.getOrRefresh('XAU/USD', TTL, async () => {
      throw new Error('timeout');
    });

    expect(cache.peek('XAU/USD')).toEqual({ sample: sample(2650), fetchedAt: T0 });
  });

  it('keeps serving the entry as fresh when the clock steps backwards', async () => {
    const refresh = vi.fn().mockResolvedValue(sample(2650));
    await cache.getOrRefresh('XAU/USD', TTL, refresh);
    clock.set(T0 - 5_000);

    const hit = await cache.getOrRefresh('XAU/USD', TTL, refresh);
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(hit).toEqual({ sample: sample(2650), fetchedAt: T0, stale: false, cached: true });
  });

  it('counts hits and misses', async () => {
    const refresh = vi.fn().mockResolvedValue(sample(2650));
    await cache.getOrRefresh('XAU/USD', TTL, refresh);
    await cache.getOrRefresh('XAU/USD', TTL, refresh);
    await cache.getOrRefresh('XAU/USD', TTL, refresh);

    expect(cache.stats()).toEqual({
      size: 1,
      hits: 2,
      misses: 1,
      refreshes: 1,
      staleServed: 0,
      inFlight: [],
    });
  });
});
