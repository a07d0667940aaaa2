/**
 * Per-key serialization
 *
 * Tasks queued under the same key run one after another; tasks under
 * different keys run independently. There is no global lock.
 */

export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run a task once every earlier task for the same key has settled
   *
   * @param key - Serialization key (lead id, normalized address)
   * @param task - Work to run inside the critical section
   * @returns The task's result; a rejected task does not block later ones
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
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

  /**
   * Number of keys with queued or running work
   */
  pendingKeys(): number {
    return this.tails.size;
  }
}
