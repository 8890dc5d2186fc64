/**
 * Dispatch Module Index
 */

import type { Env } from '../../config/env.js';
import type { QuotaManager } from '../quota/quota.manager.js';
import type { Clock, Logger } from '../shared/runtime/host.deps.js';
import {
  InMemoryAnalysisLogRepository,
  MongoAnalysisLogRepository,
  type AnalysisLogRepository,
} from './analysis-log.repository.js';
import { AnalysisDispatchGate, type PriceResolver } from './dispatch.gate.js';

export { AnalysisDispatchGate, type PriceResolver } from './dispatch.gate.js';
export { ReservationLedger } from './reservation.ledger.js';
export {
  InMemoryAnalysisLogRepository,
  MongoAnalysisLogRepository,
  type AnalysisLogRepository,
} from './analysis-log.repository.js';
export { registerDispatchRoutes } from './dispatch.routes.js';
export type * from './dispatch.types.js';

export function createAnalysisLogRepository(env: Env): AnalysisLogRepository {
  return env.STORE_DRIVER === 'mongo' ? new MongoAnalysisLogRepository() : new InMemoryAnalysisLogRepository();
}

export function createDispatchGate(
  env: Env,
  quota: QuotaManager,
  prices: PriceResolver,
  log: AnalysisLogRepository,
  logger: Logger,
  clock?: Clock
): AnalysisDispatchGate {
  return new AnalysisDispatchGate({
    quota,
    prices,
    log,
    reservationTimeoutMs: env.RESERVATION_TIMEOUT_MS,
    clock,
    logger,
  });
}
