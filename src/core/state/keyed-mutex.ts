/**
 * Keyed Mutex
 *
 * Serializes async work per key with a promise chain. Work under different
 * keys runs concurrently. A key's chain is dropped once its last holder
 * releases, so idle keys hold no memory.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `fn` after every earlier holder of `key` has finished.
   * A rejection from `fn` propagates to the caller and does not block
   * later holders.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
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
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
