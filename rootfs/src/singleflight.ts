/**
 * Deduplicate concurrent calls to an async operation per key.
 *
 * While a call for a key is in-flight, subsequent `run()` invocations with the
 * same key return the same promise. Once it settles, the next `run()` for that
 * key triggers a new call.
 */
export class KeyedSingleflight<T> {
  private readonly inflight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) return existing;

    const promise = fn().finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, promise);

    return promise;
  }

  /** number of keys with a call in flight */
  get size(): number {
    return this.inflight.size;
  }
}
