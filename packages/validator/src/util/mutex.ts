/**
 * Promise-chained lock, callers run one at a time in call order
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    // The caller observes a rejection through `run`, the chain only waits for settlement
    this.tail = run.then(settled, settled);
    return run;
  }
}

/**
 * One lock per key. Callers with the same key queue, different keys never contend.
 * A key is dropped once its queue drains.
 */
export class KeyedMutex<K> {
  private readonly tails = new Map<K, Promise<void>>();

  get size(): number {
    return this.tails.size;
  }

  async runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const run = prev.then(fn);
    const tail = run.then(settled, settled);
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

function settled(): void {
  // only marks the end of a turn
}
