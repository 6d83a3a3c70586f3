/**
 * Per-key async mutex.
 * Callers queue on each key in FIFO order; multi-key sections always
 * acquire in sorted order so two sections can never wait on each other.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  async runExclusive<T>(keys: string | string[], fn: () => Promise<T>): Promise<T> {
    const sorted = Array.from(new Set(Array.isArray(keys) ? keys : [keys])).sort();

    const releases: Array<() => void> = [];
    for (const key of sorted) {
      releases.push(await this.acquire(key));
    }

    try {
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });

    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
