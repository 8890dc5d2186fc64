/**
 * Symbol Registry
 * ===============
 *
 * Canonical instruments with their aliases, class and provider keys.
 * normalizeSymbol folds XAUUSD, xau-usd, GOLD etc. onto one cache key.
 */

import type { SymbolClass } from './price-feed.types.js';

export interface SymbolEntry {
  canonical: string;
  class: SymbolClass;
  base: string;
  quote: string;
  aliases: string[];
  yahooKey: string;
}

const ENTRIES: SymbolEntry[] = [
  { canonical: 'XAU/USD', class: 'gold', base: 'XAU', quote: 'USD', aliases: ['GOLD'], yahooKey: 'GC=F' },
  { canonical: 'EUR/USD', class: 'forex', base: 'EUR', quote: 'USD', aliases: [], yahooKey: 'EURUSD=X' },
  { canonical: 'GBP/USD', class: 'forex', base: 'GBP', quote: 'USD', aliases: [], yahooKey: 'GBPUSD=X' },
  { canonical: 'USD/JPY', class: 'forex', base: 'USD', quote: 'JPY', aliases: [], yahooKey: 'USDJPY=X' },
  { canonical: 'AUD/USD', class: 'forex', base: 'AUD', quote: 'USD', aliases: [], yahooKey: 'AUDUSD=X' },
  { canonical: 'USD/CAD', class: 'forex', base: 'USD', quote: 'CAD', aliases: [], yahooKey: 'USDCAD=X' },
  { canonical: 'USD/CHF', class: 'forex', base: 'USD', quote: 'CHF', aliases: [], yahooKey: 'USDCHF=X' },
  { canonical: 'NZD/USD', class: 'forex', base: 'NZD', quote: 'USD', aliases: [], yahooKey: 'NZDUSD=X' },
];

// Compact form (no separators) -> entry
const INDEX = new Map<string, SymbolEntry>();
for (const entry of ENTRIES) {
  INDEX.set(compact(entry.canonical), entry);
  for (const alias of entry.aliases) {
    INDEX.set(compact(alias), entry);
  }
}

function compact(raw: string): string {
  return raw
    .trim()
    .toUpperCase()
    .replace(/[\s/\-_.:]/g, '');
}

/**
 * Resolve any accepted spelling to its registry entry
 */
export function lookupSymbol(raw: string): SymbolEntry | null {
  if (!raw) return null;
  return INDEX.get(compact(raw)) ?? null;
}

export function normalizeSymbol(raw: string): string | null {
  return lookupSymbol(raw)?.canonical ?? null;
}

export function listSymbols(symbolClass?: SymbolClass): SymbolEntry[] {
  return symbolClass ? ENTRIES.filter(e => e.class === symbolClass) : [...ENTRIES];
}
