/**
 * Analysis Log Repository
 * =======================
 *
 * Audit trail of settled reservations, newest first on read.
 */

import { AnalysisLogModel, type AnalysisLogDoc } from './analysis-log.model.js';
import type { AnalysisAttempt, SettlementOutcome } from './dispatch.types.js';

export interface AnalysisLogRepository {
  record(attempt: AnalysisAttempt): Promise<void>;
  recent(limit: number, userId?: string): Promise<AnalysisAttempt[]>;
}

/**
 * Ring buffer for STORE_DRIVER=memory and tests
 */
export class InMemoryAnalysisLogRepository implements AnalysisLogRepository {
  private entries: AnalysisAttempt[] = [];

  constructor(private readonly capacity = 1000) {}

  async record(attempt: AnalysisAttempt): Promise<void> {
    this.entries.push({ ...attempt });
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  async recent(limit: number, userId?: string): Promise<AnalysisAttempt[]> {
    const matching = userId ? this.entries.filter(e => e.userId === userId) : this.entries;
    return matching.slice(-limit).reverse();
  }
}

const OUTCOMES: readonly SettlementOutcome[] = ['COMMITTED', 'RELEASED', 'EXPIRED', 'CANCELLED', 'PRICE_UNAVAILABLE'];

function toOutcome(raw: string): SettlementOutcome {
  return OUTCOMES.find(o => o === raw) ?? 'RELEASED';
}

export class MongoAnalysisLogRepository implements AnalysisLogRepository {
  async record(attempt: AnalysisAttempt): Promise<void> {
    await AnalysisLogModel.create({
      ...attempt,
      reservedAt: new Date(attempt.reservedAt),
      timestamp: new Date(attempt.timestamp),
    });
  }

  async recent(limit: number, userId?: string): Promise<AnalysisAttempt[]> {
    const docs = await AnalysisLogModel.find(userId ? { userId } : {})
      .sort({ timestamp: -1 })
      .limit(limit)
      .lean<AnalysisLogDoc[]>()
      .exec();

    return docs.map(doc => ({
      reservationId: doc.reservationId,
      userId: doc.userId,
      symbol: doc.symbol,
      outcome: toOutcome(doc.outcome),
      refunded: doc.refunded,
      ...(doc.price !== undefined ? { price: doc.price } : {}),
      ...(doc.source !== undefined ? { source: doc.source } : {}),
      reservedAt: new Date(doc.reservedAt).getTime(),
      timestamp: new Date(doc.timestamp).getTime(),
    }));
  }
}
