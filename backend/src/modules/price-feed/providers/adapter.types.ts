/**
 * Price Adapter Contract
 * ======================
 *
 * One adapter per external source. An adapter turns the source's raw
 * response into a PriceSample or throws ProviderError. Adapters are
 * READ-ONLY, keep no cache, and never retry.
 */

import type { PriceSample, ProviderId } from '../price-feed.types.js';
import type { SymbolEntry } from '../symbol.registry.js';

export type ProviderErrorKind = 'network' | 'timeout' | 'http' | 'malformed' | 'unsupported';

export class ProviderError extends Error {
  readonly provider: ProviderId;
  readonly kind: ProviderErrorKind;

  constructor(provider: ProviderId, kind: ProviderErrorKind, message: string) {
    super(`[${provider}] ${message}`);
    this.name = 'ProviderError';
    this.provider = provider;
    this.kind = kind;
  }
}

export interface PriceAdapter {
  readonly id: ProviderId;
  supports(entry: SymbolEntry): boolean;
  fetch(entry: SymbolEntry, signal: AbortSignal): Promise<PriceSample>;
}

/**
 * Normalized fields every parser extracts from its source's payload
 */
export interface RawQuote {
  price: number;
  timestamp: number; // ms epoch
  currency: string;
}

// ═══════════════════════════════════════════════════════════════
// PAYLOAD HELPERS
// ═══════════════════════════════════════════════════════════════

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts numbers and numeric strings ("2650.10"), rejects everything else
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const num = Number(value);
    return Number.isFinite(num) ? num : null;
  }
  return null;
}

/**
 * Unix seconds (number or string) → ms epoch, or null
 */
export function secondsToMs(value: unknown): number | null {
  const sec = toFiniteNumber(value);
  return sec === null ? null : Math.round(sec * 1000);
}
