/**
 * Keyed in-flight computation tracker.
 * The first caller for a key runs the computation; concurrent callers for the
 * same key await the same promise. The key is released when the computation
 * settles, successfully or not, so failures are never shared with later callers.
 */
export class SingleFlight<K, V> {
  private readonly inflight = new Map<K, Promise<V>>();
  private joinedCount = 0;

  run(key: K, fn: () => Promise<V> | V): Promise<V> {
    const existing = this.inflight.get(key);
    if (existing) {
      this.joinedCount++;
      return existing;
    }

    // fn runs on the next microtask, after the handle is installed
    const handle: Promise<V> = Promise.resolve()
      .then(fn)
      .finally(() => {
        if (this.inflight.get(key) === handle) {
          this.inflight.delete(key);
        }
      });

    this.inflight.set(key, handle);
    return handle;
  }

  has(key: K): boolean {
    return this.inflight.has(key);
  }

  get size(): number {
    return this.inflight.size;
  }

  /** Callers that joined an existing computation instead of starting one */
  get joined(): number {
    return this.joinedCount;
  }
}
