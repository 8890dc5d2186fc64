/**
 * Mongo Account Store
 * ===================
 *
 * CAS is a conditional updateOne on { userId, version }.
 */

import mongoose from 'mongoose';
import { AccountExistsError } from '../../common/errors.js';
import { emptyStats, type AccountStore } from './account.store.js';
import { UserAccountModel, type UserAccountDoc } from './account.model.js';
import { parseTier } from './tier.policy.js';
import { UNLIMITED, type AccountStats, type DailyLimit, type UserAccount } from './quota.types.js';

const DUPLICATE_KEY = 11000;

function limitToDoc(value: DailyLimit): number | null {
  return value === UNLIMITED ? null : value;
}

function limitFromDoc(value: number | null | undefined): DailyLimit {
  return value === null || value === undefined ? UNLIMITED : value;
}

export function toDoc(account: UserAccount): UserAccountDoc {
  return {
    userId: account.userId,
    email: account.email,
    tier: account.tier,
    dailyLimit: limitToDoc(account.dailyLimit),
    dailyRemaining: limitToDoc(account.dailyRemaining),
    lastResetDate: account.lastResetDate,
    totalAnalyses: account.totalAnalyses,
    reserved: account.reserved,
    active: account.active,
    version: account.version,
    createdAt: new Date(account.createdAt),
    updatedAt: new Date(account.updatedAt),
  };
}

export function fromDoc(doc: UserAccountDoc): UserAccount {
  return {
    userId: doc.userId,
    ...(doc.email ? { email: doc.email } : {}),
    tier: parseTier(doc.tier),
    dailyLimit: limitFromDoc(doc.dailyLimit),
    dailyRemaining: limitFromDoc(doc.dailyRemaining),
    lastResetDate: doc.lastResetDate,
    totalAnalyses: doc.totalAnalyses ?? 0,
    reserved: doc.reserved ?? 0,
    active: doc.active,
    version: doc.version ?? 0,
    createdAt: new Date(doc.createdAt).getTime(),
    updatedAt: new Date(doc.updatedAt).getTime(),
  };
}

interface TierActiveBucket {
  _id: { tier: string; active: boolean };
  count: number;
  analyses: number;
}

export class MongoAccountStore implements AccountStore {
  async findById(userId: string): Promise<UserAccount | null> {
    const doc = await UserAccountModel.findOne({ userId }).lean<UserAccountDoc>().exec();
    return doc ? fromDoc(doc) : null;
  }

  async insert(account: UserAccount): Promise<void> {
    try {
      await UserAccountModel.create(toDoc(account));
    } catch (err) {
      if (err instanceof mongoose.mongo.MongoServerError && err.code === DUPLICATE_KEY) {
        throw new AccountExistsError(account.userId);
      }
      throw err;
    }
  }

  async replace(account: UserAccount, expectedVersion: number): Promise<boolean> {
    const res = await UserAccountModel.updateOne(
      { userId: account.userId, version: expectedVersion },
      { $set: toDoc(account) }
    ).exec();
    return res.matchedCount === 1;
  }

  async stats(): Promise<AccountStats> {
    const buckets = await UserAccountModel.aggregate<TierActiveBucket>([
      {
        $group: {
          _id: { tier: '$tier', active: '$active' },
          count: { $sum: 1 },
          analyses: { $sum: '$totalAnalyses' },
        },
      },
    ]).exec();

    const stats = emptyStats();
    for (const bucket of buckets) {
      stats.total += bucket.count;
      if (bucket._id.active) stats.active += bucket.count;
      else stats.inactive += bucket.count;
      stats.byTier[parseTier(bucket._id.tier)] += bucket.count;
      stats.totalAnalyses += bucket.analyses;
    }
    return stats;
  }
}
