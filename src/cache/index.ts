/**
 * Session Cache Module
 *
 * TTL-based in-process cache for expensive fetches. Used by
 * CachedProvider to wrap a market data provider; the valuation engine
 * itself never caches.
 *
 * @example
 * ```typescript
 * const cache = new SessionCache();
 * const data = await cache.getOrFetch(
 *   `company:${ticker}`,
 *   () => provider.fetchCompany(ticker),
 *   CACHE_TTL.COMPANY
 * );
 * ```
 */

/**
 * Cache TTL values in milliseconds
 */
export const CACHE_TTL = {
  /** Fundamentals and quarterly statements change at most quarterly */
  COMPANY: 24 * 60 * 60 * 1000,
} as const;

interface CacheEntry<T> {
  data: T;
  timestamp: number;
  ttl: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
  size: number;
}

/**
 * Generic TTL cache. `now` is injectable so expiry can be tested without
 * waiting on the clock.
 */
export class SessionCache {
  private cache: Map<string, CacheEntry<unknown>> = new Map();
  private stats = {
    hits: 0,
    misses: 0,
    evictions: 0,
  };

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Get cached value if valid, otherwise return undefined
   */
  get<T>(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.now() - entry.timestamp >= entry.ttl) {
      this.cache.delete(key);
      this.stats.evictions++;
      return undefined;
    }

    this.stats.hits++;
    return entry.data as T;
  }

  set<T>(key: string, data: T, ttl: number): void {
    this.cache.set(key, {
      data,
      timestamp: this.now(),
      ttl,
    });
  }

  /**
   * Get cached value or fetch and cache it. Failed fetches are not cached.
   */
  async getOrFetch<T>(
    key: string,
    fetcher: () => Promise<T>,
    ttl: number
  ): Promise<T> {
    const cached = this.get<T>(key);
    if (cached !== undefined) {
      return cached;
    }

    this.stats.misses++;
    const data = await fetcher();
    this.set(key, data, ttl);
    return data;
  }

  invalidate(key: string): boolean {
    return this.cache.delete(key);
  }

  /**
   * Clear all cached data and reset statistics
   */
  clear(): void {
    this.cache.clear();
    this.stats = { hits: 0, misses: 0, evictions: 0 };
  }

  /**
   * Age of an entry in milliseconds, undefined if absent
   */
  getAge(key: string): number | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    return this.now() - entry.timestamp;
  }

  getStats(): CacheStats {
    const total = this.stats.hits + this.stats.misses;
    return {
      ...this.stats,
      hitRate: total > 0 ? this.stats.hits / total : 0,
      size: this.cache.size,
    };
  }
}
