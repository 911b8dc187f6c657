/**
 * Keyed lock
 *
 * Cable creates lock both endpoint interfaces, so two cables on one
 * port are applied one after the other and the second sees the
 * connected marker the first one set. Keys are registered
 * synchronously in a single pass, so waiters form one global FIFO
 * order per key.
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of any of `keys` has finished
   */
  async run<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const unique = [...new Set(keys)];
    const previous = unique.map((key) => this.tails.get(key) ?? Promise.resolve());

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    for (const key of unique) {
      this.tails.set(key, current);
    }

    await Promise.all(previous);
    try {
      return await fn();
    } finally {
      release();
      for (const key of unique) {
        if (this.tails.get(key) === current) {
          this.tails.delete(key);
        }
      }
    }
  }

  /** Number of keys currently held or waited on */
  get size(): number {
    return this.tails.size;
  }
}
