/**
 * Quota Module Index
 */

import type { Env } from '../../config/env.js';
import type { Clock, Logger } from '../shared/runtime/host.deps.js';
import { InMemoryAccountStore, type AccountStore } from './account.store.js';
import { MongoAccountStore } from './account.mongo.store.js';
import { QuotaManager } from './quota.manager.js';
import { createTierPolicy } from './tier.policy.js';

export { QuotaManager } from './quota.manager.js';
export { InMemoryAccountStore, type AccountStore } from './account.store.js';
export { MongoAccountStore } from './account.mongo.store.js';
export { createTierPolicy, parseTier, suggestUpgrade } from './tier.policy.js';
export { registerQuotaRoutes, serializeAccount } from './quota.routes.js';
export type * from './quota.types.js';
export { TIERS, UNLIMITED } from './quota.types.js';

export function createAccountStore(env: Env): AccountStore {
  return env.STORE_DRIVER === 'mongo' ? new MongoAccountStore() : new InMemoryAccountStore();
}

export function createQuotaManager(env: Env, store: AccountStore, logger: Logger, clock?: Clock): QuotaManager {
  return new QuotaManager({
    store,
    policy: createTierPolicy({ basic: env.QUOTA_LIMIT_BASIC, premium: env.QUOTA_LIMIT_PREMIUM }),
    clock,
    logger,
  });
}
