/**
 * Price Feed Types
 * ================
 *
 * INVARIANTS:
 * - A PriceSample is immutable once built (frozen)
 * - price > 0 and inside the symbol's plausible band (enforced by the validator)
 * - Every sample is attributable to exactly one provider (no blending)
 */

// ═══════════════════════════════════════════════════════════════
// PROVIDERS (closed set)
// ═══════════════════════════════════════════════════════════════

export const PROVIDER_IDS = ['goldapi', 'metals_live', 'fcsapi', 'yahoo'] as const;

export type ProviderId = typeof PROVIDER_IDS[number];

export type SymbolClass = 'gold' | 'forex';

/**
 * Static ordering of adapters per symbol class, highest priority first
 */
export type ProviderRank = Readonly<Record<SymbolClass, readonly ProviderId[]>>;

// ═══════════════════════════════════════════════════════════════
// SAMPLES
// ═══════════════════════════════════════════════════════════════

export interface PriceSample {
  readonly symbol: string;      // canonical, e.g. XAU/USD
  readonly price: number;
  readonly currency: string;    // quote currency
  readonly timestamp: number;   // provider's quote time, ms epoch
  readonly source: ProviderId;
}

export interface CacheEntry {
  sample: PriceSample;
  fetchedAt: number;
}

/**
 * What resolvePrice hands back: the sample plus cache provenance
 */
export interface ResolvedPrice {
  sample: PriceSample;
  fetchedAt: number;
  stale: boolean;
  cached: boolean;
}

export function createSample(input: PriceSample): PriceSample {
  return Object.freeze({ ...input });
}

// ═══════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════

export interface PriceBand {
  min: number;
  max: number;
}

export type RejectionReason =
  | 'NOT_POSITIVE_FINITE'
  | 'OUT_OF_BAND'
  | 'NO_BAND'
  | 'FUTURE_TIMESTAMP'
  | 'TOO_OLD';

export type ValidationResult =
  | { ok: true }
  | { ok: false; reason: RejectionReason; detail: string };

// ═══════════════════════════════════════════════════════════════
// HEALTH & PROBE
// ═══════════════════════════════════════════════════════════════

export type ProviderStatus = 'UP' | 'DEGRADED' | 'DOWN';

export interface ProviderHealth {
  id: ProviderId;
  status: ProviderStatus;
  errorStreak: number;
  successCount: number;
  errorCount: number;
  rejectionCount: number;
  lastOkAt?: number;
  lastErrorAt?: number;
  lastError?: string;
}

export type ProbeResult =
  | { provider: ProviderId; ok: true; latencyMs: number; sample: PriceSample }
  | { provider: ProviderId; ok: false; latencyMs: number; stage: 'fetch' | 'validate'; error: string };

export type BulkPriceResult =
  | { symbol: string; ok: true; price: ResolvedPrice }
  | { symbol: string; ok: false; error: string };
