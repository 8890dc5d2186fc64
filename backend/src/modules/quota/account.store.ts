/**
 * Account Store
 * =============
 *
 * Persistence seam for UserAccount. Writes are compare-and-swap on
 * `version`: replace() succeeds only if the stored version still equals
 * expectedVersion, and the caller retries on false.
 */

import { AccountExistsError } from '../../common/errors.js';
import type { AccountStats, UserAccount } from './quota.types.js';

export interface AccountStore {
  findById(userId: string): Promise<UserAccount | null>;
  insert(account: UserAccount): Promise<void>;
  replace(account: UserAccount, expectedVersion: number): Promise<boolean>;
  stats(): Promise<AccountStats>;
}

export function emptyStats(): AccountStats {
  return {
    total: 0,
    active: 0,
    inactive: 0,
    byTier: { basic: 0, premium: 0, vip: 0 },
    totalAnalyses: 0,
  };
}

/**
 * In-process store for tests and STORE_DRIVER=memory.
 * Copies on the way in and out, so callers never share state with it.
 */
export class InMemoryAccountStore implements AccountStore {
  private accounts = new Map<string, UserAccount>();

  async findById(userId: string): Promise<UserAccount | null> {
    const found = this.accounts.get(userId);
    return found ? { ...found } : null;
  }

  async insert(account: UserAccount): Promise<void> {
    if (this.accounts.has(account.userId)) {
      throw new AccountExistsError(account.userId);
    }
    this.accounts.set(account.userId, { ...account });
  }

  async replace(account: UserAccount, expectedVersion: number): Promise<boolean> {
    const current = this.accounts.get(account.userId);
    if (!current || current.version !== expectedVersion) return false;
    this.accounts.set(account.userId, { ...account });
    return true;
  }

  async stats(): Promise<AccountStats> {
    const stats = emptyStats();
    for (const account of this.accounts.values()) {
      stats.total++;
      if (account.active) stats.active++;
      else stats.inactive++;
      stats.byTier[account.tier]++;
      stats.totalAnalyses += account.totalAnalyses;
    }
    return stats;
  }

  size(): number {
    return this.accounts.size;
  }
}
