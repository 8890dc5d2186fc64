import { describe, it, expect } from 'vitest';
import { ReservationLedger } from '../reservation.ledger.js';

describe('ReservationLedger', () => {
  it('hands a reservation to exactly one taker', () => {
    const ledger = new ReservationLedger(1_000);
    const reservation = ledger.create('u1', 'XAU/USD', 0);

    expect(ledger.take(reservation.reservationId)).toEqual(reservation);
    expect(ledger.take(reservation.reservationId)).toBeNull();
  });

  it('takes only reservations at or past their deadline', () => {
    const ledger = new ReservationLedger(1_000);
    const early = ledger.create('u1', 'XAU/USD', 0);
    const late = ledger.create('u2', 'EUR/USD', 500);

    expect(ledger.takeExpired(1_000).map(r => r.reservationId)).toEqual([early.reservationId]);
    expect(ledger.get(late.reservationId)).toEqual(late);
    expect(ledger.stats()).toEqual({ open: 1, settled: 0 });
  });

  it('forgets settled reservations after the retention window', () => {
    const ledger = new ReservationLedger(1_000, 5_000);
    ledger.markSettled({ reservationId: 'r1', outcome: 'COMMITTED', refunded: false, settledAt: 0 });

    ledger.pruneSettled(5_000);
    expect(ledger.findSettled('r1')).not.toBeNull();

    ledger.pruneSettled(5_001);
    expect(ledger.findSettled('r1')).toBeNull();
  });
});
