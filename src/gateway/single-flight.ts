/**
 * In-flight call sharing: while a call for `key` is pending, later callers
 * with the same key await the same promise instead of starting another.
 */
export class SingleFlight<T> {
  private readonly inflight = new Map<string, Promise<T>>();

  /** `shared` is true when the caller joined an existing flight */
  async run(key: string, execute: () => Promise<T>): Promise<{ result: T; shared: boolean }> {
    const existing = this.inflight.get(key);
    if (existing) return { result: await existing, shared: true };

    const promise = execute().finally(() => this.inflight.delete(key));
    this.inflight.set(key, promise);
    return { result: await promise, shared: false };
  }

  get size(): number {
    return this.inflight.size;
  }
}
