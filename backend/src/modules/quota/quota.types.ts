/**
 * Quota Types
 * ===========
 *
 * INVARIANTS:
 * - dailyRemaining ∈ [0, dailyLimit] for finite tiers
 * - VIP carries the UNLIMITED sentinel for both limit and remaining, never a large integer
 * - lastResetDate is a UTC day (YYYY-MM-DD); reset happens lazily on use
 * - reserved counts reservations taken on lastResetDate that are not settled yet
 * - version increments on every write (compare-and-swap)
 */

export const TIERS = ['basic', 'premium', 'vip'] as const;

export type Tier = typeof TIERS[number];

export const UNLIMITED = 'unlimited' as const;

export type Unlimited = typeof UNLIMITED;

export type DailyLimit = number | Unlimited;

export interface UserAccount {
  userId: string;
  email?: string;
  tier: Tier;
  dailyLimit: DailyLimit;
  dailyRemaining: DailyLimit;
  lastResetDate: string;
  totalAnalyses: number;
  reserved: number;
  active: boolean;
  version: number;
  createdAt: number;
  updatedAt: number;
}

// ═══════════════════════════════════════════════════════════════
// DECISIONS
// ═══════════════════════════════════════════════════════════════

export type QuotaDenial =
  | {
      code: 'ACCOUNT_DISABLED';
      message: string;
    }
  | {
      code: 'QUOTA_EXCEEDED';
      message: string;
      tier: Tier;
      dailyLimit: number;
      remaining: 0;
      suggestedTier: Tier | null;
    };

export type QuotaDecision =
  | { granted: true; tier: Tier; remainingAfter: DailyLimit }
  | { granted: false; denial: QuotaDenial };

export interface ReleaseResult {
  refunded: boolean;
  account: UserAccount;
}

export interface RegisterUserInput {
  userId?: string;
  email?: string;
  tier?: Tier;
}

export interface AccountStats {
  total: number;
  active: number;
  inactive: number;
  byTier: Record<Tier, number>;
  totalAnalyses: number;
}
