/**
 * Dispatch Cache — write-once store of dispatchers keyed by concrete deferred
 * type (`Promise<number>`, `Eventual<User>`, ...).
 *
 * Population happens synchronously inside a single call to `getOrAdd`, so two
 * callers can never observe different dispatchers for the same key.
 */
export class DispatchCache<TDispatcher> {
  private readonly entries = new Map<string, TDispatcher>();
  private readonly enabled: boolean;

  constructor(enabled = true) {
    this.enabled = enabled;
  }

  getOrAdd(key: string, factory: (key: string) => TDispatcher): TDispatcher {
    if (!this.enabled) return factory(key);

    const existing = this.entries.get(key);
    if (existing !== undefined) return existing;

    const created = factory(key);
    this.entries.set(key, created);
    return created;
  }

  get size(): number {
    return this.entries.size;
  }
}
