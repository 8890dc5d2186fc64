/**
 * KEYED MUTEX
 * ===========
 *
 * Per-key async lock. Work for one key runs strictly one at a time,
 * in arrival order; different keys never wait on each other.
 *
 * Only the tail of each key's chain is kept, and the entry is dropped
 * once the chain drains, so idle keys cost nothing.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  size(): number {
    return this.tails.size;
  }
}
