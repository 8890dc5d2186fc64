/**
 * Tier Policy
 * ===========
 *
 * tier → daily limit, and the upgrade path suggested on denial.
 * Basic and Premium limits are configurable; VIP is always UNLIMITED.
 */

import { InvalidTierError } from '../../common/errors.js';
import { TIERS, UNLIMITED, type DailyLimit, type Tier, type Unlimited } from './quota.types.js';

export interface TierPolicy {
  readonly limits: Readonly<Record<Tier, DailyLimit>>;
}

export const DEFAULT_TIER_LIMITS = { basic: 1, premium: 5 } as const;

export function createTierPolicy(limits: { basic: number; premium: number } = DEFAULT_TIER_LIMITS): TierPolicy {
  return Object.freeze({
    limits: Object.freeze({
      basic: limits.basic,
      premium: limits.premium,
      vip: UNLIMITED,
    }),
  });
}

export function dailyLimitFor(policy: TierPolicy, tier: Tier): DailyLimit {
  return policy.limits[tier];
}

export function isUnlimited(value: DailyLimit): value is Unlimited {
  return value === UNLIMITED;
}

const UPGRADE_PATH: Record<Tier, Tier | null> = {
  basic: 'premium',
  premium: 'vip',
  vip: null,
};

export function suggestUpgrade(tier: Tier): Tier | null {
  return UPGRADE_PATH[tier];
}

export function parseTier(raw: unknown): Tier {
  const value = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
  const tier = TIERS.find(t => t === value);
  if (!tier) throw new InvalidTierError(String(raw));
  return tier;
}
