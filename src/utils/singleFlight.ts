/**
 * At most one outstanding fetch per key.
 *
 * The first caller for a key starts `fn`; callers arriving while it is in
 * flight get the same promise. The key is released once it settles, so the
 * next miss starts a fresh fetch.
 */
export class SingleFlight<T> {
  private readonly inflight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): { promise: Promise<T>; shared: boolean } {
    const existing = this.inflight.get(key);
    if (existing) {
      return { promise: existing, shared: true };
    }

    const promise = fn().finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, promise);
    return { promise, shared: false };
  }

  has(key: string): boolean {
    return this.inflight.has(key);
  }

  get size(): number {
    return this.inflight.size;
  }
}
