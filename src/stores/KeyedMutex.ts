/**
 * Mutual exclusion scoped to a key.
 * Tasks for the same key run one after another in arrival order; tasks for
 * different keys never wait on each other. A key's entry is dropped as soon
 * as its queue drains.
 */

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /** True while a task for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with running or queued tasks. */
  get activeKeys(): number {
    return this.tails.size;
  }

  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(() => task());
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
