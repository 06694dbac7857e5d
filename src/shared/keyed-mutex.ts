/**
 * Serializes async sections that share a key; different keys run in parallel.
 *
 * Each key keeps only the tail of its chain, and the entry is dropped once
 * the last waiter finishes, so idle keys cost nothing.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(fn);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a section running or queued. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
