/**
 * QUOTA MANAGER
 * =============
 *
 * Owns every read-modify-write of UserAccount.
 *
 * Two layers keep decrements exact under concurrency:
 * - in-process: a per-user KeyedMutex serializes work for one userId
 * - cross-process: the store's compare-and-swap on `version`, retried
 *   up to maxCasRetries before ConcurrentUpdateError
 *
 * Different users never wait on each other.
 */

import { v4 as uuidv4 } from 'uuid';
import { AccountNotFoundError, ConcurrentUpdateError } from '../../common/errors.js';
import { KeyedMutex } from '../shared/runtime/keyed-mutex.js';
import { defaultClock, defaultLogger, utcDay, type Clock, type Logger } from '../shared/runtime/host.deps.js';
import type { AccountStore } from './account.store.js';
import * as rules from './quota.rules.js';
import { dailyLimitFor, type TierPolicy } from './tier.policy.js';
import type {
  AccountStats,
  QuotaDecision,
  RegisterUserInput,
  ReleaseResult,
  Tier,
  UserAccount,
} from './quota.types.js';

export interface QuotaManagerOptions {
  store: AccountStore;
  policy: TierPolicy;
  clock?: Clock;
  logger?: Logger;
  maxCasRetries?: number;
}

export class QuotaManager {
  private readonly store: AccountStore;
  private readonly policy: TierPolicy;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly maxCasRetries: number;
  private readonly mutex = new KeyedMutex();

  constructor(options: QuotaManagerOptions) {
    this.store = options.store;
    this.policy = options.policy;
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? defaultLogger;
    this.maxCasRetries = options.maxCasRetries ?? 3;
  }

  // ─────────────────────────────────────────────────────────────
  // Registration
  // ─────────────────────────────────────────────────────────────

  async registerUser(input: RegisterUserInput = {}): Promise<UserAccount> {
    const now = this.clock.now();
    const tier = input.tier ?? 'basic';
    const limit = dailyLimitFor(this.policy, tier);

    const account: UserAccount = {
      userId: input.userId ?? uuidv4(),
      ...(input.email ? { email: input.email } : {}),
      tier,
      dailyLimit: limit,
      dailyRemaining: limit,
      lastResetDate: utcDay(now),
      totalAnalyses: 0,
      reserved: 0,
      active: true,
      version: 0,
      createdAt: now,
      updatedAt: now,
    };

    await this.store.insert(account);
    this.logger.info({ userId: account.userId, tier }, 'User registered');
    return account;
  }

  /**
   * Current view with the daily reset applied. Read-only: the reset is
   * persisted by the next write.
   */
  async getAccount(userId: string, now: number = this.clock.now()): Promise<UserAccount> {
    const account = await this.load(userId);
    return rules.applyDayReset(account, utcDay(now));
  }

  async getStats(): Promise<AccountStats> {
    return this.store.stats();
  }

  // ─────────────────────────────────────────────────────────────
  // Quota
  // ─────────────────────────────────────────────────────────────

  /**
   * Take one unit of today's quota, or say why not.
   * Unknown users throw AccountNotFoundError.
   */
  async checkAndReserve(userId: string, now?: number): Promise<QuotaDecision> {
    const { result: decision } = await this.mutate(userId, (account, today) => rules.reserve(account, today), now);

    if (!decision.granted) {
      this.logger.info({ userId, code: decision.denial.code }, 'Quota denied');
    }
    return decision;
  }

  /**
   * Count a produced analysis against the reservation taken on reservedDay
   * (UTC, defaults to today).
   */
  async commit(userId: string, reservedDay?: string): Promise<UserAccount> {
    const { account } = await this.mutate(userId, (current, today) =>
      rules.commit(current, today, reservedDay ?? today)
    );
    return account;
  }

  async release(userId: string, reservedDay?: string): Promise<ReleaseResult> {
    const { account, result } = await this.mutate(userId, (current, today) =>
      rules.release(current, today, reservedDay ?? today)
    );
    return { refunded: result.refunded, account };
  }

  // ─────────────────────────────────────────────────────────────
  // Admin
  // ─────────────────────────────────────────────────────────────

  async setTier(userId: string, tier: Tier): Promise<UserAccount> {
    const { account } = await this.mutate(userId, (current, today) =>
      rules.retier(current, tier, this.policy, today)
    );
    this.logger.info({ userId, tier, dailyLimit: account.dailyLimit }, 'Tier changed');
    return account;
  }

  async activate(userId: string): Promise<UserAccount> {
    const { account } = await this.mutate(userId, current => rules.setActive(current, true));
    this.logger.info({ userId }, 'Account activated');
    return account;
  }

  async deactivate(userId: string): Promise<UserAccount> {
    const { account } = await this.mutate(userId, current => rules.setActive(current, false));
    this.logger.info({ userId }, 'Account deactivated');
    return account;
  }

  // ─────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────

  private async load(userId: string): Promise<UserAccount> {
    const account = await this.store.findById(userId);
    if (!account) throw new AccountNotFoundError(userId);
    return account;
  }

  /**
   * Load → pure step → CAS write, under the user's lock.
   * A step that returns the same object skips the write.
   * Resolves with the account as stored plus the step's result.
   */
  private mutate<T>(
    userId: string,
    step: (account: UserAccount, today: string) => rules.Step<T>,
    at?: number
  ): Promise<rules.Step<T>> {
    return this.mutex.runExclusive(userId, async () => {
      for (let attempt = 1; attempt <= this.maxCasRetries; attempt++) {
        const current = await this.load(userId);
        const now = at ?? this.clock.now();
        const { account, result } = step(current, utcDay(now));

        if (account === current) return { account: current, result };

        const next: UserAccount = { ...account, version: current.version + 1, updatedAt: now };
        if (await this.store.replace(next, current.version)) {
          return { account: next, result };
        }

        this.logger.warn({ userId, attempt }, 'Account version conflict, retrying');
      }

      throw new ConcurrentUpdateError(userId);
    });
  }
}
