import { describe, it, expect, beforeEach } from 'vitest';
import { AccountExistsError, AccountNotFoundError, ConcurrentUpdateError } from '../../../common/errors.js';
import { manualClock, mockLogger, T0, type ManualClock } from '../../price-feed/__tests__/fixtures.js';
import { InMemoryAccountStore } from '../account.store.js';
import { QuotaManager } from '../quota.manager.js';
import { createTierPolicy } from '../tier.policy.js';
import type { UserAccount } from '../quota.types.js';

const DAY = 24 * 3600 * 1000;

/** Loses the first `failures` compare-and-swap attempts */
class ContendedStore extends InMemoryAccountStore {
  constructor(private failures: number) {
    super();
  }

  async replace(account: UserAccount, expectedVersion: number): Promise<boolean> {
    if (this.failures > 0) {
      this.failures--;
      return false;
    }
    return super.replace(account, expectedVersion);
  }
}

describe('QuotaManager', () => {
  let clock: ManualClock;
  let logger: ReturnType<typeof mockLogger>;
  let store: InMemoryAccountStore;
  let quota: QuotaManager;

  beforeEach(() => {
    clock = manualClock();
    logger = mockLogger();
    store = new InMemoryAccountStore();
    quota = new QuotaManager({ store, policy: createTierPolicy(), clock, logger });
  });

  describe('registerUser', () => {
    it('creates a basic account with a full day of quota', async () => {
      const account = await quota.registerUser({ userId: 'u1', email: 'u1@example.com' });

      expect(account).toEqual({
        userId: 'u1',
        email: 'u1@example.com',
        tier: 'basic',
        dailyLimit: 1,
        dailyRemaining: 1,
        lastResetDate: '2025-01-15',
        totalAnalyses: 0,
        reserved: 0,
        active: true,
        version: 0,
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it('generates an id when none is given', async () => {
      const account = await quota.registerUser();
      expect(account.userId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('refuses a duplicate id', async () => {
      await quota.registerUser({ userId: 'u1' });
      await expect(quota.registerUser({ userId: 'u1' })).rejects.toBeInstanceOf(AccountExistsError);
    });

    it('gives VIP the unlimited sentinel', async () => {
      const account = await quota.registerUser({ userId: 'v1', tier: 'vip' });
      expect(account.dailyLimit).toBe('unlimited');
      expect(account.dailyRemaining).toBe('unlimited');
    });
  });

  describe('checkAndReserve', () => {
    it('grants the last unit and then denies with an upgrade suggestion', async () => {
      await quota.registerUser({ userId: 'u1' });

      expect(await quota.checkAndReserve('u1')).toEqual({ granted: true, tier: 'basic', remainingAfter: 0 });
      expect(await quota.checkAndReserve('u1')).toEqual({
        granted: false,
        denial: {
          code: 'QUOTA_EXCEEDED',
          message: 'Daily limit reached for basic tier, upgrade to premium for more analyses',
          tier: 'basic',
          dailyLimit: 1,
          remaining: 0,
          suggestedTier: 'premium',
        },
      });
    });

    it('grants exactly dailyLimit out of many concurrent requests', async () => {
      await quota.registerUser({ userId: 'p1', tier: 'premium' });

      const decisions = await Promise.all(Array.from({ length: 20 }, () => quota.checkAndReserve('p1')));

      expect(decisions.filter(d => d.granted)).toHaveLength(5);
      const account = await quota.getAccount('p1');
      expect(account.dailyRemaining).toBe(0);
      expect(account.reserved).toBe(5);
    });

    it('resets on the first check of a new UTC day', async () => {
      await quota.registerUser({ userId: 'p1', tier: 'premium' });
      for (let i = 0; i < 5; i++) await quota.checkAndReserve('p1');
      expect((await quota.checkAndReserve('p1')).granted).toBe(false);

      clock.set(Date.parse('2025-01-16T00:00:00.000Z'));

      expect(await quota.checkAndReserve('p1')).toEqual({ granted: true, tier: 'premium', remainingAfter: 4 });
      const account = await quota.getAccount('p1');
      expect(account.lastResetDate).toBe('2025-01-16');
      expect(account.reserved).toBe(1);
    });

    it('evaluates against an explicit now', async () => {
      await quota.registerUser({ userId: 'u1' });
      await quota.checkAndReserve('u1');

      const tomorrow = await quota.checkAndReserve('u1', T0 + DAY);
      expect(tomorrow).toEqual({ granted: true, tier: 'basic', remainingAfter: 0 });
    });

    it('never limits VIP', async () => {
      await quota.registerUser({ userId: 'v1', tier: 'vip' });

      for (let i = 0; i < 25; i++) {
        expect(await quota.checkAndReserve('v1')).toEqual({ granted: true, tier: 'vip', remainingAfter: 'unlimited' });
      }
      expect((await quota.getAccount('v1')).dailyRemaining).toBe('unlimited');
    });

    it('denies a deactivated account until it is activated again', async () => {
      await quota.registerUser({ userId: 'u1' });
      await quota.deactivate('u1');

      expect(await quota.checkAndReserve('u1')).toEqual({
        granted: false,
        denial: { code: 'ACCOUNT_DISABLED', message: 'Account u1 is deactivated' },
      });

      await quota.activate('u1');
      expect((await quota.checkAndReserve('u1')).granted).toBe(true);
    });

    it('throws for unknown users', async () => {
      await expect(quota.checkAndReserve('ghost')).rejects.toBeInstanceOf(AccountNotFoundError);
    });

    it('bumps the version on every write', async () => {
      await quota.registerUser({ userId: 'u1' });
      clock.advance(1000);
      await quota.checkAndReserve('u1');

      const stored = await store.findById('u1');
      expect(stored?.version).toBe(1);
      expect(stored?.updatedAt).toBe(T0 + 1000);
    });
  });

  describe('commit and release', () => {
    it('commit counts the analysis and closes the reservation', async () => {
      await quota.registerUser({ userId: 'u1' });
      await quota.checkAndReserve('u1');

      const account = await quota.commit('u1');

      expect(account.totalAnalyses).toBe(1);
      expect(account.reserved).toBe(0);
      expect(account.dailyRemaining).toBe(0);
    });

    it('release restores the pre-reservation value once', async () => {
      await quota.registerUser({ userId: 'u1' });
      await quota.checkAndReserve('u1');

      const first = await quota.release('u1');
      expect(first.refunded).toBe(true);
      expect(first.account.dailyRemaining).toBe(1);

      const second = await quota.release('u1');
      expect(second.refunded).toBe(false);
      expect(second.account.dailyRemaining).toBe(1);

      expect((await quota.checkAndReserve('u1')).granted).toBe(true);
    });

    it('ignores a commit with nothing reserved', async () => {
      await quota.registerUser({ userId: 'u1' });

      const account = await quota.commit('u1');

      expect(account.totalAnalyses).toBe(0);
      expect(account.version).toBe(0);
    });

    it('does not refund a reservation from an earlier day', async () => {
      await quota.registerUser({ userId: 'u1' });
      await quota.checkAndReserve('u1');
      clock.advance(DAY);

      const result = await quota.release('u1');

      expect(result.refunded).toBe(false);
      expect(result.account.dailyRemaining).toBe(1);
      expect(result.account.lastResetDate).toBe('2025-01-16');
    });
  });

  describe('setTier', () => {
    it('applies the new limit immediately, mid-day', async () => {
      await quota.registerUser({ userId: 'u1' });
      await quota.checkAndReserve('u1');
      expect((await quota.checkAndReserve('u1')).granted).toBe(false);

      const upgraded = await quota.setTier('u1', 'premium');
      expect(upgraded).toMatchObject({ tier: 'premium', dailyLimit: 5, dailyRemaining: 5 });

      const decisions = [];
      for (let i = 0; i < 6; i++) decisions.push(await quota.checkAndReserve('u1'));
      expect(decisions.map(d => d.granted)).toEqual([true, true, true, true, true, false]);

      const last = decisions[5];
      if (last && !last.granted && last.denial.code === 'QUOTA_EXCEEDED') {
        expect(last.denial.suggestedTier).toBe('vip');
        expect(last.denial.dailyLimit).toBe(5);
      } else {
        throw new Error('expected a QUOTA_EXCEEDED denial');
      }
    });

    it('resets remaining even when the tier is unchanged', async () => {
      await quota.registerUser({ userId: 'u1' });
      await quota.checkAndReserve('u1');

      const account = await quota.setTier('u1', 'basic');
      expect(account.dailyRemaining).toBe(1);
    });

    it('never refunds above the new limit', async () => {
      await quota.registerUser({ userId: 'p1', tier: 'premium' });
      await quota.checkAndReserve('p1');
      await quota.setTier('p1', 'basic');

      const result = await quota.release('p1');
      expect(result.refunded).toBe(true);
      expect(result.account.dailyRemaining).toBe(1);
    });

    it('logs the change', async () => {
      await quota.registerUser({ userId: 'u1' });
      await quota.setTier('u1', 'vip');

      expect(logger.info).toHaveBeenCalledWith({ userId: 'u1', tier: 'vip', dailyLimit: 'unlimited' }, 'Tier changed');
    });
  });

  describe('getAccount', () => {
    it('shows the reset without writing it', async () => {
      await quota.registerUser({ userId: 'u1' });
      await quota.checkAndReserve('u1');
      clock.advance(DAY);

      const view = await quota.getAccount('u1');
      const stored = await store.findById('u1');

      expect(view.dailyRemaining).toBe(1);
      expect(stored?.dailyRemaining).toBe(0);
      expect(stored?.version).toBe(1);
    });
  });

  describe('getStats', () => {
    it('counts accounts by tier and status', async () => {
      await quota.registerUser({ userId: 'a' });
      await quota.registerUser({ userId: 'b', tier: 'premium' });
      await quota.registerUser({ userId: 'c', tier: 'vip' });
      await quota.deactivate('a');
      await quota.checkAndReserve('b');
      await quota.commit('b');

      expect(await quota.getStats()).toEqual({
        total: 3,
        active: 2,
        inactive: 1,
        byTier: { basic: 1, premium: 1, vip: 1 },
        totalAnalyses: 1,
      });
    });
  });

  describe('compare-and-swap', () => {
    it('retries a lost write', async () => {
      const contended = new ContendedStore(2);
      const manager = new QuotaManager({ store: contended, policy: createTierPolicy(), clock, logger });
      await manager.registerUser({ userId: 'u1' });

      expect((await manager.checkAndReserve('u1')).granted).toBe(true);
      expect(logger.warn).toHaveBeenCalledTimes(2);
      expect((await contended.findById('u1'))?.dailyRemaining).toBe(0);
    });

    it('gives up after three lost writes', async () => {
      const contended = new ContendedStore(3);
      const manager = new QuotaManager({ store: contended, policy: createTierPolicy(), clock, logger });
      await manager.registerUser({ userId: 'u1' });

      await expect(manager.checkAndReserve('u1')).rejects.toBeInstanceOf(ConcurrentUpdateError);
      expect((await contended.findById('u1'))?.dailyRemaining).toBe(1);
    });
  });
});
