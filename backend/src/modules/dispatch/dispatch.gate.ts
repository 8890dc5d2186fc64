/**
 * ANALYSIS DISPATCH GATE
 * ======================
 *
 * requestAnalysis(userId, symbol):
 *   1. unknown symbol → UnknownSymbolError, quota untouched
 *   2. QuotaManager.checkAndReserve → Denied → Rejected (price system untouched)
 *   3. resolve price → failure → release, Rejected(PRICE_UNAVAILABLE)
 *   4. Proceed(price, remaining, reservationId)
 *
 * The caller settles the reservation once the LLM is done: commit on
 * success, release on failure. Unsettled reservations are released after
 * reservationTimeoutMs by sweepExpired(), which also runs at the start of
 * every requestAnalysis / settle.
 *
 * An abort while the price is resolving releases the reservation at once.
 * The shared cache refresh keeps running for the other waiters.
 */

import {
  AccountNotFoundError,
  PriceUnavailableError,
  ReservationNotFoundError,
  UnknownSymbolError,
} from '../../common/errors.js';
import type { ResolvedPrice } from '../price-feed/price-feed.types.js';
import { lookupSymbol } from '../price-feed/symbol.registry.js';
import type { QuotaManager } from '../quota/quota.manager.js';
import type { UserAccount } from '../quota/quota.types.js';
import { defaultClock, defaultLogger, type Clock, type Logger } from '../shared/runtime/host.deps.js';
import type { AnalysisLogRepository } from './analysis-log.repository.js';
import type {
  AnalysisDecision,
  Rejected,
  RequestAnalysisOptions,
  Reservation,
  SettleAction,
  SettleResult,
  SettlementOutcome,
} from './dispatch.types.js';
import { ReservationLedger } from './reservation.ledger.js';

export interface PriceResolver {
  resolve(symbol: string): Promise<ResolvedPrice>;
}

export interface AnalysisDispatchGateOptions {
  quota: QuotaManager;
  prices: PriceResolver;
  log: AnalysisLogRepository;
  reservationTimeoutMs: number;
  clock?: Clock;
  logger?: Logger;
}

const ABORTED = Symbol('aborted');

function cancelled(): Rejected {
  return { status: 'REJECTED', reason: { code: 'CANCELLED', message: 'Request was cancelled by the caller' } };
}

/**
 * Resolves with ABORTED when the signal fires first. The losing promise
 * keeps its rejection handler from Promise.race.
 */
function raceAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T | typeof ABORTED> {
  if (!signal) return work;
  if (signal.aborted) return Promise.resolve(ABORTED);

  let onAbort: () => void = () => undefined;
  const aborted = new Promise<typeof ABORTED>(resolve => {
    onAbort = () => resolve(ABORTED);
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return Promise.race([work, aborted]).finally(() => signal.removeEventListener('abort', onAbort));
}

export class AnalysisDispatchGate {
  private readonly quota: QuotaManager;
  private readonly prices: PriceResolver;
  private readonly log: AnalysisLogRepository;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly ledger: ReservationLedger;

  constructor(options: AnalysisDispatchGateOptions) {
    this.quota = options.quota;
    this.prices = options.prices;
    this.log = options.log;
    this.clock = options.clock ?? defaultClock;
    this.logger = options.logger ?? defaultLogger;
    this.ledger = new ReservationLedger(options.reservationTimeoutMs);
  }

  // ─────────────────────────────────────────────────────────────
  // Request
  // ─────────────────────────────────────────────────────────────

  async requestAnalysis(
    userId: string,
    symbol: string,
    options: RequestAnalysisOptions = {}
  ): Promise<AnalysisDecision> {
    const { signal } = options;
    await this.sweepExpired();

    const entry = lookupSymbol(symbol);
    if (!entry) throw new UnknownSymbolError(symbol);
    if (signal?.aborted) return cancelled();

    const reservedAt = this.clock.now();
    const decision = await this.quota.checkAndReserve(userId, reservedAt);
    if (!decision.granted) {
      return { status: 'REJECTED', reason: decision.denial };
    }

    const reservation = this.ledger.create(userId, entry.canonical, reservedAt);

    let price: ResolvedPrice | typeof ABORTED;
    try {
      price = await raceAbort(this.prices.resolve(entry.canonical), signal);
    } catch (err) {
      await this.closeOpen(reservation, 'PRICE_UNAVAILABLE');
      if (err instanceof PriceUnavailableError) {
        return {
          status: 'REJECTED',
          reason: { code: 'PRICE_UNAVAILABLE', message: err.message, symbol: entry.canonical },
        };
      }
      throw err;
    }

    if (price === ABORTED || signal?.aborted) {
      this.logger.info({ userId, symbol: entry.canonical, reservationId: reservation.reservationId }, 'Analysis request cancelled');
      await this.closeOpen(reservation, 'CANCELLED');
      return cancelled();
    }

    reservation.price = price.sample.price;
    reservation.source = price.sample.source;

    return {
      status: 'PROCEED',
      reservationId: reservation.reservationId,
      userId,
      price,
      remaining: decision.remainingAfter,
      expiresAt: reservation.expiresAt,
    };
  }

  // ─────────────────────────────────────────────────────────────
  // Settlement
  // ─────────────────────────────────────────────────────────────

  /**
   * Commit or release a reservation. Settling an already settled
   * reservation returns the first outcome with repeated=true.
   */
  async settle(reservationId: string, action: SettleAction): Promise<SettleResult> {
    await this.sweepExpired();

    const reservation = this.ledger.take(reservationId);
    if (!reservation) {
      const prior = this.ledger.findSettled(reservationId);
      if (!prior) throw new ReservationNotFoundError(reservationId);
      return { reservationId, outcome: prior.outcome, refunded: prior.refunded, repeated: true };
    }

    return this.close(reservation, action, action === 'commit' ? 'COMMITTED' : 'RELEASED');
  }

  /**
   * Release every reservation past its deadline. Returns how many were released.
   */
  async sweepExpired(now: number = this.clock.now()): Promise<number> {
    this.ledger.pruneSettled(now);
    const expired = this.ledger.takeExpired(now);

    for (const reservation of expired) {
      this.logger.warn(
        { reservationId: reservation.reservationId, userId: reservation.userId, symbol: reservation.symbol },
        'Reservation expired, releasing quota'
      );
      try {
        await this.close(reservation, 'release', 'EXPIRED');
      } catch (err) {
        this.logger.error(
          { reservationId: reservation.reservationId, userId: reservation.userId, error: err instanceof Error ? err.message : String(err) },
          'Failed to release expired reservation'
        );
      }
    }

    return expired.length;
  }

  pendingReservation(reservationId: string): Reservation | null {
    return this.ledger.get(reservationId);
  }

  stats(): { open: number; settled: number } {
    return this.ledger.stats();
  }

  recentAttempts(limit = 50, userId?: string) {
    return this.log.recent(limit, userId);
  }

  // ─────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────

  /**
   * Release a reservation rejected inside requestAnalysis. It leaves the
   * ledger first so neither settle nor the sweeper can release it again.
   */
  private async closeOpen(reservation: Reservation, outcome: SettlementOutcome): Promise<void> {
    const taken = this.ledger.take(reservation.reservationId);
    if (!taken) return;
    await this.close(taken, 'release', outcome);
  }

  /**
   * Apply the quota side of a settlement exactly once. On a failed quota
   * call the reservation goes back to the ledger so it can be settled again
   * or expire.
   */
  private async close(
    reservation: Reservation,
    action: SettleAction,
    outcome: SettlementOutcome
  ): Promise<SettleResult> {
    let account: UserAccount;
    let refunded = false;

    try {
      if (action === 'commit') {
        account = await this.quota.commit(reservation.userId, reservation.reservedDay);
      } else {
        const released = await this.quota.release(reservation.userId, reservation.reservedDay);
        account = released.account;
        refunded = released.refunded;
      }
    } catch (err) {
      if (!(err instanceof AccountNotFoundError)) this.ledger.restore(reservation);
      throw err;
    }

    const now = this.clock.now();
    this.ledger.markSettled({ reservationId: reservation.reservationId, outcome, refunded, settledAt: now });

    try {
      await this.log.record({
        reservationId: reservation.reservationId,
        userId: reservation.userId,
        symbol: reservation.symbol,
        outcome,
        refunded,
        ...(reservation.price !== undefined ? { price: reservation.price, source: reservation.source } : {}),
        reservedAt: reservation.createdAt,
        timestamp: now,
      });
    } catch (err) {
      this.logger.error(
        { reservationId: reservation.reservationId, error: err instanceof Error ? err.message : String(err) },
        'Failed to record analysis attempt'
      );
    }

    return { reservationId: reservation.reservationId, outcome, refunded, repeated: false, account };
  }
}
