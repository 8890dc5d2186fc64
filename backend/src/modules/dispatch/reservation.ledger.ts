/**
 * RESERVATION LEDGER
 * ==================
 *
 * Open reservations keyed by id, plus a short memory of settled ones so a
 * repeated settle answers with the first outcome instead of touching quota
 * again.
 *
 * take() removes the reservation before any await, so whoever takes it
 * is the only one who settles it.
 */

import { v4 as uuidv4 } from 'uuid';
import { utcDay } from '../shared/runtime/host.deps.js';
import type { Reservation, SettlementOutcome } from './dispatch.types.js';

export interface SettledRecord {
  reservationId: string;
  outcome: SettlementOutcome;
  refunded: boolean;
  settledAt: number;
}

export class ReservationLedger {
  private open = new Map<string, Reservation>();
  private settled = new Map<string, SettledRecord>();

  constructor(
    private readonly timeoutMs: number,
    private readonly settledRetentionMs: number = timeoutMs * 2
  ) {}

  create(userId: string, symbol: string, now: number): Reservation {
    const reservation: Reservation = {
      reservationId: uuidv4(),
      userId,
      symbol,
      createdAt: now,
      expiresAt: now + this.timeoutMs,
      reservedDay: utcDay(now),
    };
    this.open.set(reservation.reservationId, reservation);
    return reservation;
  }

  take(reservationId: string): Reservation | null {
    const reservation = this.open.get(reservationId);
    if (!reservation) return null;
    this.open.delete(reservationId);
    return reservation;
  }

  /** Put back a reservation whose settlement failed */
  restore(reservation: Reservation): void {
    this.open.set(reservation.reservationId, reservation);
  }

  takeExpired(now: number): Reservation[] {
    const expired: Reservation[] = [];
    for (const reservation of this.open.values()) {
      if (reservation.expiresAt <= now) expired.push(reservation);
    }
    for (const reservation of expired) {
      this.open.delete(reservation.reservationId);
    }
    return expired;
  }

  markSettled(record: SettledRecord): void {
    this.settled.set(record.reservationId, record);
  }

  findSettled(reservationId: string): SettledRecord | null {
    return this.settled.get(reservationId) ?? null;
  }

  pruneSettled(now: number): void {
    for (const [id, record] of this.settled) {
      if (now - record.settledAt > this.settledRetentionMs) this.settled.delete(id);
    }
  }

  get(reservationId: string): Reservation | null {
    return this.open.get(reservationId) ?? null;
  }

  stats(): { open: number; settled: number } {
    return { open: this.open.size, settled: this.settled.size };
  }
}
