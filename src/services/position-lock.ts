/**
 * Keyed async lock
 *
 * Serializes work per key (position id, signal id, order id) while letting
 * different keys proceed concurrently. Each key holds the tail of a promise
 * chain; a caller waits for the current tail and installs its own.
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly holders = new Set<string>();

  /**
   * Run `fn` while holding the lock for `key`
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    this.holders.add(key);

    try {
      return await fn();
    } finally {
      this.holders.delete(key);
      release();
      // Drop the entry once nobody queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether some caller currently holds the lock for `key`
   */
  isHeld(key: string): boolean {
    return this.holders.has(key);
  }

  /**
   * Number of keys with a holder or waiters
   */
  get size(): number {
    return this.tails.size;
  }
}
