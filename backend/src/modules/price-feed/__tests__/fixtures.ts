/**
 * Shared test doubles for the price feed
 */

import { vi } from 'vitest';
import type { Clock, Logger } from '../../shared/runtime/host.deps.js';
import { createSample, type PriceSample, type ProviderId, type SymbolClass } from '../price-feed.types.js';
import type { PriceAdapter } from '../providers/adapter.types.js';
import type { SymbolEntry } from '../symbol.registry.js';

export const T0 = Date.parse('2025-01-15T12:00:00.000Z');

export interface ManualClock extends Clock {
  advance(ms: number): void;
  set(ms: number): void;
}

export function manualClock(start = T0): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance: ms => {
      current += ms;
    },
    set: ms => {
      current = ms;
    },
  };
}

export function mockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

type FetchImpl = (entry: SymbolEntry, signal: AbortSignal) => Promise<PriceSample>;

/**
 * PriceAdapter whose fetch behaviour is set per test
 */
export class FakeAdapter implements PriceAdapter {
  calls = 0;
  readonly signals: AbortSignal[] = [];

  constructor(
    readonly id: ProviderId,
    private impl: FetchImpl,
    private readonly classes: SymbolClass[] = ['gold', 'forex']
  ) {}

  supports(entry: SymbolEntry): boolean {
    return this.classes.includes(entry.class);
  }

  async fetch(entry: SymbolEntry, signal: AbortSignal): Promise<PriceSample> {
    this.calls++;
    this.signals.push(signal);
    return this.impl(entry, signal);
  }

  setImpl(impl: FetchImpl): void {
    this.impl = impl;
  }
}

export function quoting(id: ProviderId, price: number, clock: Clock): FetchImpl {
  return async entry =>
    createSample({ symbol: entry.canonical, price, currency: entry.quote, timestamp: clock.now(), source: id });
}

export function failing(message = 'connection refused'): FetchImpl {
  return async () => {
    throw new Error(message);
  };
}

/** Never settles unless aborted */
export function hanging(): FetchImpl {
  return (_entry, signal) =>
    new Promise<PriceSample>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
}

export const TEST_BANDS = {
  'XAU/USD': { min: 1000, max: 10000 },
  'EUR/USD': { min: 0.5, max: 2 },
  'USD/JPY': { min: 60, max: 250 },
};
