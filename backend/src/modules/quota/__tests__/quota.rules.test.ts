import { describe, it, expect } from 'vitest';
import { applyDayReset, commit, release, reserve, retier, setActive } from '../quota.rules.js';
import { createTierPolicy, parseTier, suggestUpgrade } from '../tier.policy.js';
import type { UserAccount } from '../quota.types.js';

function account(overrides: Partial<UserAccount> = {}): UserAccount {
  return {
    userId: 'u1',
    tier: 'basic',
    dailyLimit: 1,
    dailyRemaining: 1,
    lastResetDate: '2025-01-15',
    totalAnalyses: 0,
    reserved: 0,
    active: true,
    version: 3,
    createdAt: 0,
    updatedAt: 0,
    ...overrides,
  };
}

describe('quota rules', () => {
  it('leaves the account untouched on the same day', () => {
    const current = account({ dailyRemaining: 0 });
    expect(applyDayReset(current, '2025-01-15')).toBe(current);
  });

  it('resets remaining and outstanding reservations on a new day', () => {
    const reset = applyDayReset(account({ dailyRemaining: 0, reserved: 1 }), '2025-01-16');
    expect(reset).toMatchObject({ dailyRemaining: 1, reserved: 0, lastResetDate: '2025-01-16' });
  });

  it('does not reset a disabled account before denying it', () => {
    const current = account({ active: false, dailyRemaining: 0, lastResetDate: '2025-01-14' });
    const step = reserve(current, '2025-01-15');
    expect(step.account).toBe(current);
    expect(step.result.granted).toBe(false);
  });

  it('returns the reset account on denial so the reset is persisted', () => {
    const step = reserve(account({ dailyLimit: 0, dailyRemaining: 0, lastResetDate: '2025-01-14' }), '2025-01-15');
    expect(step.result.granted).toBe(false);
    expect(step.account.lastResetDate).toBe('2025-01-15');
  });

  it('counts VIP reservations without touching remaining', () => {
    const step = reserve(account({ tier: 'vip', dailyLimit: 'unlimited', dailyRemaining: 'unlimited' }), '2025-01-15');
    expect(step.account).toMatchObject({ dailyRemaining: 'unlimited', reserved: 1 });
  });

  it('does nothing on release without a reservation', () => {
    const current = account();
    const step = release(current, '2025-01-15');
    expect(step.account).toBe(current);
    expect(step.result).toEqual({ refunded: false });
  });

  it('does nothing on commit without a reservation', () => {
    const current = account();
    const step = commit(current, '2025-01-15');
    expect(step.account).toBe(current);
    expect(step.account.totalAnalyses).toBe(0);
  });

  it('leaves the new day reservations alone when settling one from the day before', () => {
    const current = account({ dailyRemaining: 0, reserved: 1, lastResetDate: '2025-01-16' });

    const released = release(current, '2025-01-16', '2025-01-15');
    expect(released.account).toBe(current);
    expect(released.result).toEqual({ refunded: false });

    const committed = commit(current, '2025-01-16', '2025-01-15');
    expect(committed.account).toMatchObject({ totalAnalyses: 1, reserved: 1, dailyRemaining: 0 });
  });

  it('keeps same-day reservations across a tier change and drops older ones', () => {
    const policy = createTierPolicy();
    expect(retier(account({ reserved: 1 }), 'premium', policy, '2025-01-15').account.reserved).toBe(1);
    expect(retier(account({ reserved: 1 }), 'premium', policy, '2025-01-16').account.reserved).toBe(0);
  });

  it('skips the write when activation does not change', () => {
    const current = account();
    expect(setActive(current, true).account).toBe(current);
  });
});

describe('tier policy', () => {
  it('maps tiers to limits', () => {
    expect(createTierPolicy({ basic: 2, premium: 10 }).limits).toEqual({ basic: 2, premium: 10, vip: 'unlimited' });
  });

  it('suggests the next tier up', () => {
    expect(suggestUpgrade('basic')).toBe('premium');
    expect(suggestUpgrade('premium')).toBe('vip');
    expect(suggestUpgrade('vip')).toBeNull();
  });

  it('parses tier names case-insensitively', () => {
    expect(parseTier(' Premium ')).toBe('premium');
    expect(() => parseTier('gold')).toThrow('Invalid tier: gold');
  });
});
