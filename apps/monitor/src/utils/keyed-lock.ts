/**
 * Serializes async work per key.
 *
 * Work for the same key runs one at a time in call order; different keys
 * run independently. A failed task does not block the ones queued after it.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
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

  /**
   * Check if work is queued or running for key
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys with queued or running work
   */
  size(): number {
    return this.tails.size;
  }
}
