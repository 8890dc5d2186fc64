/**
 * Quota Rules
 * ===========
 *
 * Pure state transitions over UserAccount. No I/O, no clock:
 * the caller passes `today` (UTC day) and persists the result.
 *
 * Each step returns the next account, or the same object when nothing
 * changed so the caller can skip the write.
 */

import { dailyLimitFor, isUnlimited, suggestUpgrade, type TierPolicy } from './tier.policy.js';
import type { QuotaDecision, Tier, UserAccount } from './quota.types.js';

export interface Step<T> {
  account: UserAccount;
  result: T;
}

/**
 * Lazy daily reset: a new UTC day restores the full limit and drops
 * reservations taken on the previous day.
 */
export function applyDayReset(account: UserAccount, today: string): UserAccount {
  if (account.lastResetDate === today) return account;
  return {
    ...account,
    dailyRemaining: account.dailyLimit,
    lastResetDate: today,
    reserved: 0,
  };
}

export function reserve(account: UserAccount, today: string): Step<QuotaDecision> {
  if (!account.active) {
    return {
      account,
      result: {
        granted: false,
        denial: { code: 'ACCOUNT_DISABLED', message: `Account ${account.userId} is deactivated` },
      },
    };
  }

  const current = applyDayReset(account, today);
  const remaining = current.dailyRemaining;

  if (isUnlimited(remaining)) {
    return {
      account: { ...current, reserved: current.reserved + 1 },
      result: { granted: true, tier: current.tier, remainingAfter: remaining },
    };
  }

  if (remaining > 0) {
    return {
      account: { ...current, dailyRemaining: remaining - 1, reserved: current.reserved + 1 },
      result: { granted: true, tier: current.tier, remainingAfter: remaining - 1 },
    };
  }

  const limit = current.dailyLimit;
  const suggestedTier = suggestUpgrade(current.tier);
  return {
    account: current,
    result: {
      granted: false,
      denial: {
        code: 'QUOTA_EXCEEDED',
        message: suggestedTier
          ? `Daily limit reached for ${current.tier} tier, upgrade to ${suggestedTier} for more analyses`
          : `Daily limit reached for ${current.tier} tier`,
        tier: current.tier,
        dailyLimit: isUnlimited(limit) ? 0 : limit,
        remaining: 0,
        suggestedTier,
      },
    },
  };
}

/**
 * The analysis was produced: count it and close one reservation.
 * A reservation from an earlier day was already dropped by the reset, so
 * only the lifetime count moves. Without an outstanding reservation
 * nothing changes.
 */
export function commit(account: UserAccount, today: string, reservedDay: string = today): Step<UserAccount> {
  const current = applyDayReset(account, today);

  if (reservedDay !== current.lastResetDate) {
    const next = { ...current, totalAnalyses: current.totalAnalyses + 1 };
    return { account: next, result: next };
  }
  if (current.reserved === 0) {
    return { account: current, result: current };
  }

  const next = {
    ...current,
    totalAnalyses: current.totalAnalyses + 1,
    reserved: current.reserved - 1,
  };
  return { account: next, result: next };
}

/**
 * Give a reserved unit back. Reservations from an earlier day were already
 * wiped by the reset, so nothing is refunded for them; the refund never
 * lifts remaining above the limit.
 */
export function release(
  account: UserAccount,
  today: string,
  reservedDay: string = today
): Step<{ refunded: boolean }> {
  const current = applyDayReset(account, today);

  if (reservedDay !== current.lastResetDate || current.reserved === 0) {
    return { account: current, result: { refunded: false } };
  }

  const remaining = current.dailyRemaining;
  const limit = current.dailyLimit;
  const next: UserAccount = {
    ...current,
    reserved: current.reserved - 1,
    dailyRemaining:
      isUnlimited(remaining) || isUnlimited(limit) ? remaining : Math.min(limit, remaining + 1),
  };
  return { account: next, result: { refunded: true } };
}

/**
 * Change tier. Limit and remaining are both set to the new tier's limit,
 * and the reset date moves to today; used quota is not carried over.
 */
export function retier(account: UserAccount, tier: Tier, policy: TierPolicy, today: string): Step<UserAccount> {
  const limit = dailyLimitFor(policy, tier);
  const next: UserAccount = {
    ...account,
    tier,
    dailyLimit: limit,
    dailyRemaining: limit,
    lastResetDate: today,
    reserved: account.lastResetDate === today ? account.reserved : 0,
  };
  return { account: next, result: next };
}

export function setActive(account: UserAccount, active: boolean): Step<UserAccount> {
  if (account.active === active) return { account, result: account };
  const next = { ...account, active };
  return { account: next, result: next };
}
