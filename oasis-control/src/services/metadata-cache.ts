type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export interface MetadataCacheOptions {
  /** TTL used when `get` is called without one. */
  defaultTtlMs?: number;
  now?: () => number;
}

/**
 * Keyed TTL cache for cloud metadata. Concurrent misses on the same key
 * share one fetch; a failed fetch stores nothing and rejects every waiter.
 */
export class MetadataCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inflight = new Map<string, Promise<T>>();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;

  constructor(options: MetadataCacheOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? 5 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string, fetchFn: () => Promise<T>, ttlMs: number = this.defaultTtlMs): Promise<T> {
    const hit = this.fresh(key);
    if (hit) return hit.value;

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const task = (async () => {
      try {
        const value = await fetchFn();
        this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
        return value;
      } finally {
        this.inflight.delete(key);
      }
    })();
    this.inflight.set(key, task);
    return task;
  }

  /** Cached value if still fresh, without fetching. */
  peek(key: string): T | undefined {
    return this.fresh(key)?.value;
  }

  invalidate(key?: string): void {
    if (key === undefined) {
      this.entries.clear();
      return;
    }
    this.entries.delete(key);
  }

  private fresh(key: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
