/**
 * Keyed Lock
 *
 * Serialises async critical sections that share a key. Sections on different
 * keys run concurrently. Used by the credential store so that two requests
 * touching the same user (or registering the same email) never interleave
 * between their read and their write.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task on `key` has settled.
   *
   * The task's result or rejection is passed through unchanged; a rejected
   * task does not block later tasks on the same key.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
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
      // Drop the entry once nobody queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with a running or queued task
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}
