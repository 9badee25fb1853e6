/**
 * A set of mutual exclusion locks, one per key. Callbacks holding the same
 * key run one at a time, in the order they asked for the lock; callbacks
 * holding different keys do not wait for each other.
 */
export class KeyedMutex<Key> {
  // Held keys, each with the list of waiters queued behind the holder.
  readonly #locks: Map<Key, (() => void)[]> = new Map();

  /**
   * Acquires the lock for a key, runs the callback, and releases the lock.
   *
   * @param key - The key to lock.
   * @param callback - The function to execute exclusively.
   * @returns A promise that resolves with the return value of the callback.
   */
  async runExclusive<Result>(
    key: Key,
    callback: () => Promise<Result>,
  ): Promise<Result> {
    await this.acquire(key);
    try {
      return await callback();
    } finally {
      this.release(key);
    }
  }

  /**
   * Acquires the lock for a key. If the key is already held, waits until it
   * is handed over.
   *
   * @param key - The key to lock.
   */
  async acquire(key: Key): Promise<void> {
    const waiters = this.#locks.get(key);
    if (!waiters) {
      this.#locks.set(key, []);
      return;
    }
    await new Promise<void>((resolve) => {
      waiters.push(resolve);
    });
  }

  /**
   * Releases the lock for a key, handing it to the next waiter if there is
   * one.
   *
   * @param key - The key to unlock.
   * @throws If the key is not locked.
   */
  release(key: Key): void {
    const waiters = this.#locks.get(key);
    if (!waiters) {
      throw new Error('Cannot release an unlocked key.');
    }
    const next = waiters.shift();
    if (next) {
      next();
    } else {
      this.#locks.delete(key);
    }
  }

  isLocked(key: Key): boolean {
    return this.#locks.has(key);
  }
}
