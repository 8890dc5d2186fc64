/**
 * Provider Health
 * ===============
 *
 * Circuit-breaker style status per adapter:
 * - 3 consecutive failures → DEGRADED
 * - 5 consecutive failures → DOWN
 * - Any accepted sample → UP, streak reset
 *
 * Observational only: the aggregator never skips or reorders adapters
 * because of health. Validation rejections count as failures for the
 * streak but are tallied separately.
 */

import type { ProviderHealth, ProviderId, ProviderStatus } from './price-feed.types.js';

const DEGRADED_THRESHOLD = 3;
const DOWN_THRESHOLD = 5;

export function createInitialHealth(id: ProviderId): ProviderHealth {
  return {
    id,
    status: 'UP',
    errorStreak: 0,
    successCount: 0,
    errorCount: 0,
    rejectionCount: 0,
  };
}

export function registerSuccess(health: ProviderHealth, now: number): ProviderHealth {
  return {
    ...health,
    status: 'UP',
    errorStreak: 0,
    successCount: health.successCount + 1,
    lastOkAt: now,
  };
}

export function registerFailure(
  health: ProviderHealth,
  now: number,
  kind: 'error' | 'rejection',
  message: string
): ProviderHealth {
  const errorStreak = health.errorStreak + 1;

  let status: ProviderStatus = health.status;
  if (errorStreak >= DOWN_THRESHOLD) {
    status = 'DOWN';
  } else if (errorStreak >= DEGRADED_THRESHOLD) {
    status = 'DEGRADED';
  }

  return {
    ...health,
    status,
    errorStreak,
    errorCount: kind === 'error' ? health.errorCount + 1 : health.errorCount,
    rejectionCount: kind === 'rejection' ? health.rejectionCount + 1 : health.rejectionCount,
    lastErrorAt: now,
    lastError: message,
  };
}

export class ProviderHealthBoard {
  private board = new Map<ProviderId, ProviderHealth>();

  constructor(ids: Iterable<ProviderId>) {
    for (const id of ids) {
      this.board.set(id, createInitialHealth(id));
    }
  }

  private current(id: ProviderId): ProviderHealth {
    return this.board.get(id) ?? createInitialHealth(id);
  }

  success(id: ProviderId, now: number): void {
    this.board.set(id, registerSuccess(this.current(id), now));
  }

  error(id: ProviderId, now: number, message: string): void {
    this.board.set(id, registerFailure(this.current(id), now, 'error', message));
  }

  rejection(id: ProviderId, now: number, message: string): void {
    this.board.set(id, registerFailure(this.current(id), now, 'rejection', message));
  }

  get(id: ProviderId): ProviderHealth {
    return { ...this.current(id) };
  }

  snapshot(): ProviderHealth[] {
    return Array.from(this.board.values()).map(h => ({ ...h }));
  }
}
