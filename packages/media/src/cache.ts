/**
 * Result Cache
 *
 * Time-bounded, in-memory, single-flight per key. Concurrent requests for a
 * key that is being computed join the running computation; nothing is
 * computed twice inside one TTL window. Expired entries are dropped lazily
 * when they are next looked up.
 *
 * Capacity is bounded by how many distinct keys are requested within one TTL
 * window; call prune() periodically if that is ever a concern.
 */

export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

export interface CacheEntry<V> {
  readonly key: string;
  readonly value: V;
  readonly insertedAt: number;
  readonly ttlMs: number;
}

export interface TtlCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return this.now() - entry.insertedAt > entry.ttlMs;
  }

  /**
   * Fresh cached value, or undefined. Evicts the entry if it has expired.
   */
  peek(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /**
   * Return the cached value, join an in-flight computation, or start one.
   * A rejected computation reaches every waiter and is not cached.
   */
  getOrCompute(key: string, compute: () => Promise<V>): Promise<V> {
    const cached = this.peek(key);
    if (cached !== undefined) {
      return Promise.resolve(cached);
    }

    const running = this.inFlight.get(key);
    if (running) {
      return running;
    }

    // compute starts on a later tick, after the promise is registered below
    const promise = (async () => {
      try {
        const value = await Promise.resolve().then(compute);
        this.entries.set(key, { key, value, insertedAt: this.now(), ttlMs: this.ttlMs });
        return value;
      } finally {
        this.inFlight.delete(key);
      }
    })();

    this.inFlight.set(key, promise);
    return promise;
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Drop every expired entry; returns how many were removed
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Number of stored entries, expired ones included until evicted */
  get size(): number {
    return this.entries.size;
  }
}
