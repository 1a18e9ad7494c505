/**
 * KeyedAsyncLock — serializes async operations that share a key.
 *
 * Operations on different keys run concurrently; operations on the same key
 * run one after another in call order. Used by the session registry so that a
 * clear, a touch and a janitor removal of the same session never interleave
 * their filesystem steps.
 *
 * Usage:
 *   private readonly locks = new KeyedAsyncLock();
 *   clear(id: string) {
 *     return this.locks.acquire(id, () => this.doClear(id));
 *   }
 */
export class KeyedAsyncLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run fn once every earlier acquire() for the same key has settled.
   * A rejection from fn rejects only the returned promise, not the queue.
   */
  acquire<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      // Drop the entry once nothing else has queued behind us.
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}
