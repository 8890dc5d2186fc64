/**
 * Dispatch Types
 * ==============
 *
 * requestAnalysis either lets the caller proceed to the LLM with a price and
 * an open reservation, or rejects with a reason. Every reservation ends in
 * exactly one settlement: commit, release, expiry or cancellation.
 */

import type { ResolvedPrice } from '../price-feed/price-feed.types.js';
import type { DailyLimit, QuotaDenial, UserAccount } from '../quota/quota.types.js';

export type SettleAction = 'commit' | 'release';

export type SettlementOutcome =
  | 'COMMITTED'
  | 'RELEASED'
  | 'EXPIRED'
  | 'CANCELLED'
  | 'PRICE_UNAVAILABLE';

export interface Reservation {
  reservationId: string;
  userId: string;
  symbol: string;
  createdAt: number;
  expiresAt: number;
  /** UTC day the quota unit was taken from */
  reservedDay: string;
  /** set once the price resolved */
  price?: number;
  source?: string;
}

// ═══════════════════════════════════════════════════════════════
// DECISION
// ═══════════════════════════════════════════════════════════════

export type RejectionReason =
  | QuotaDenial
  | { code: 'PRICE_UNAVAILABLE'; message: string; symbol: string }
  | { code: 'CANCELLED'; message: string };

export interface Proceed {
  status: 'PROCEED';
  reservationId: string;
  userId: string;
  price: ResolvedPrice;
  remaining: DailyLimit;
  expiresAt: number;
}

export interface Rejected {
  status: 'REJECTED';
  reason: RejectionReason;
}

export type AnalysisDecision = Proceed | Rejected;

export interface RequestAnalysisOptions {
  signal?: AbortSignal;
}

// ═══════════════════════════════════════════════════════════════
// SETTLEMENT
// ═══════════════════════════════════════════════════════════════

export interface SettleResult {
  reservationId: string;
  outcome: SettlementOutcome;
  refunded: boolean;
  /** true when the reservation had been settled before this call */
  repeated: boolean;
  account?: UserAccount;
}

export interface AnalysisAttempt {
  reservationId: string;
  userId: string;
  symbol: string;
  outcome: SettlementOutcome;
  refunded: boolean;
  price?: number;
  source?: string;
  reservedAt: number;
  timestamp: number;
}
