/**
 * TTL Cache
 *
 * In-memory cache with per-entry TTL, an LRU size bound and hit/miss stats.
 * Each entry carries the names of the providers that produced it so callers
 * can invalidate one provider's entries and leave the rest cached.
 *
 * Reads and writes are synchronous; on Node's event loop that makes every
 * operation atomic with respect to concurrent callers. A read only touches
 * the entry's LRU position.
 */

export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
  /** Providers whose data is in `value`. Empty for results no provider supplied. */
  providers: readonly string[];
}

export interface CacheStats {
  totalEntries: number;
  activeEntries: number;
  expiredEntries: number;
  maxSize: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export interface TtlCacheOptions {
  /** Maximum entries before least-recently-used eviction. 0 = unlimited. */
  maxSize?: number;
  /** Injected clock for tests. */
  now?: () => number;
}

const DEFAULT_MAX_SIZE = 10_000;

export class TtlCache<T> {
  // Map iteration order doubles as the LRU order: oldest first.
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxSize: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(opts: TtlCacheOptions = {}) {
    this.maxSize = opts.maxSize ?? DEFAULT_MAX_SIZE;
    this.now = opts.now ?? Date.now;
  }

  /** Fresh entry for `key`, or undefined when missing or expired. */
  getEntry(key: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry;
  }

  get(key: string): T | undefined {
    return this.getEntry(key)?.value;
  }

  set(key: string, value: T, ttlSeconds: number, providers: readonly string[] = []): void {
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return;
    }
    this.entries.delete(key);
    if (this.maxSize > 0) this.evictIfNeeded();
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000, providers });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Remove every entry produced (fully or partly) by `provider`. Returns count removed. */
  deleteByProvider(provider: string): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.providers.includes(provider)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /** Remove all expired entries. Returns count removed. */
  cleanupExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Current number of entries (including possibly expired). */
  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const now = this.now();
    let expired = 0;
    for (const entry of this.entries.values()) {
      if (now >= entry.expiresAt) expired++;
    }
    const requests = this.hits + this.misses;
    return {
      totalEntries: this.entries.size,
      activeEntries: this.entries.size - expired,
      expiredEntries: expired,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: requests > 0 ? Math.round((this.hits / requests) * 1000) / 1000 : 0,
    };
  }

  private evictIfNeeded(): void {
    if (this.entries.size < this.maxSize) return;
    this.cleanupExpired();
    for (const key of this.entries.keys()) {
      if (this.entries.size < this.maxSize) break;
      this.entries.delete(key);
    }
  }
}

/** Join key parts into a cache key. */
export function makeCacheKey(...parts: Array<string | number | undefined>): string {
  return parts.map((p) => (p === undefined ? '' : String(p))).join(':');
}
