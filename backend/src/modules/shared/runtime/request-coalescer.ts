/**
 * REQUEST COALESCER
 * =================
 *
 * Single-flight per key. PriceCache keys it by canonical symbol: when a
 * symbol is stale or missing, the first caller starts the provider walk
 * and every caller arriving before it settles awaits the same promise,
 * so one refresh feeds all waiters and its error reaches all of them.
 *
 * The key is freed when the run settles; the next miss starts a new one.
 */

export class RequestCoalescer<T> {
  private inflight = new Map<string, Promise<T>>();

  /**
   * Join the run in flight for key, or start one with fn
   */
  run(key: string, fn: () => Promise<T>): Promise<T> {
    const joined = this.inflight.get(key);
    if (joined) return joined;

    const started = fn().finally(() => {
      if (this.inflight.get(key) === started) this.inflight.delete(key);
    });
    this.inflight.set(key, started);
    return started;
  }

  isInFlight(key: string): boolean {
    return this.inflight.has(key);
  }

  /** Keys with a run in flight, for cache stats */
  keys(): string[] {
    return Array.from(this.inflight.keys());
  }
}
