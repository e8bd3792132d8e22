interface CacheEntry<T> {
  value: T;
  ttl: number;
  createdAt: number;
}

/**
 * Process-local TTL map. Adapters share one per run so a lookup made for one
 * provider is not repeated by the next; nothing is written to disk.
 */
export class MemoryCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private inflight = new Map<string, Promise<T>>();

  constructor(private readonly defaultTtlMs = 10 * 60 * 1000) {}

  set(key: string, value: T, ttlMs = this.defaultTtlMs): void {
    this.cache.set(key, {
      value,
      ttl: ttlMs,
      createdAt: Date.now()
    });
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (entry.createdAt + entry.ttl < Date.now()) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.value;
  }

  /**
   * Returns the cached value, or runs `load` once and caches its result.
   * Concurrent callers for the same key share the in-flight promise.
   */
  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const inflight = this.inflight.get(key);
    if (inflight) return inflight;

    const promise = load()
      .then(value => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.inflight.delete(key);
      });
    this.inflight.set(key, promise);
    return promise;
  }
}
