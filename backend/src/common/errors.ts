/**
 * Application Errors
 * ==================
 *
 * AppError carries an HTTP status and a stable error code.
 * The global error handler in app.ts maps it to `{ ok: false, error, message }`.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

// ═══════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════

export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG_ERROR', message, 500);
    this.name = 'ConfigError';
  }
}

// ═══════════════════════════════════════════════════════════════
// PRICE FEED
// ═══════════════════════════════════════════════════════════════

export class UnknownSymbolError extends AppError {
  constructor(symbol: string) {
    super('UNKNOWN_SYMBOL', `Unknown symbol: ${symbol}`, 400);
    this.name = 'UnknownSymbolError';
  }
}

export class PriceUnavailableError extends AppError {
  readonly symbol: string;

  constructor(symbol: string, detail?: string) {
    super('PRICE_UNAVAILABLE', `Price unavailable for ${symbol}${detail ? `: ${detail}` : ''}`, 503);
    this.name = 'PriceUnavailableError';
    this.symbol = symbol;
  }
}

// ═══════════════════════════════════════════════════════════════
// ACCOUNTS
// ═══════════════════════════════════════════════════════════════

export class AccountNotFoundError extends AppError {
  constructor(userId: string) {
    super('ACCOUNT_NOT_FOUND', `Account ${userId} not found`, 404);
    this.name = 'AccountNotFoundError';
  }
}

export class AccountExistsError extends AppError {
  constructor(userId: string) {
    super('ACCOUNT_EXISTS', `Account ${userId} already exists`, 409);
    this.name = 'AccountExistsError';
  }
}

export class InvalidTierError extends AppError {
  constructor(tier: string) {
    super('INVALID_TIER', `Invalid tier: ${tier}`, 400);
    this.name = 'InvalidTierError';
  }
}

export class ConcurrentUpdateError extends AppError {
  constructor(userId: string) {
    super('CONCURRENT_UPDATE', `Account ${userId} is being updated concurrently, retry later`, 409);
    this.name = 'ConcurrentUpdateError';
  }
}

// ═══════════════════════════════════════════════════════════════
// DISPATCH
// ═══════════════════════════════════════════════════════════════

export class ReservationNotFoundError extends AppError {
  constructor(reservationId: string) {
    super('RESERVATION_NOT_FOUND', `Reservation ${reservationId} not found or already settled`, 404);
    this.name = 'ReservationNotFoundError';
  }
}
