/**
 * Per-key mutual exclusion
 *
 * Tasks sharing a key run one at a time in arrival order; tasks with
 * different keys never wait on each other.
 */

export class KeyedMutex {
  private readonly tails: Map<string, Promise<void>> = new Map();

  /**
   * Run `task` once every earlier task for `key` has settled.
   * A failing task releases the key like a successful one.
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * True while a task holds or waits for `key`
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys currently held */
  size(): number {
    return this.tails.size;
  }
}
