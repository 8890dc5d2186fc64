/**
 * Host Dependencies
 * =================
 *
 * Core services never import the transport or process globals directly.
 * Logger and Clock are injected; app.ts wires Fastify's pino logger in.
 */

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export interface Clock {
  now: () => number; // milliseconds epoch
}

export const defaultLogger: Logger = {
  info: (obj, msg) => console.log(`[INFO] ${msg || ''}`, obj),
  warn: (obj, msg) => console.warn(`[WARN] ${msg || ''}`, obj),
  error: (obj, msg) => console.error(`[ERROR] ${msg || ''}`, obj),
  debug: (obj, msg) => console.debug(`[DEBUG] ${msg || ''}`, obj),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const defaultClock: Clock = {
  now: () => Date.now(),
};

/**
 * UTC calendar day (YYYY-MM-DD) for an epoch timestamp
 */
export function utcDay(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}
