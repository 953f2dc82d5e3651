/**
 * keyed-lock.ts - Per-key serialisation of async work
 *
 * Adding documents awaits the embedding provider between validation and
 * the index write. Without a lock, two adds to the same collection could
 * both pass the duplicate-id and dimension checks and then both write.
 * KeyedLock runs work for one key strictly one after another while work
 * for different keys proceeds in parallel.
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `fn` once every earlier call for `key` has settled.
   * The result or rejection of `fn` is passed through unchanged.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last one out removes the entry so the map doesn't grow per key forever
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}
