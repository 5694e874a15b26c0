import { CACHE_TTL, SessionCache } from '../cache/index.ts';
import type { CompanyFinancials } from '../types/index.ts';
import { logger } from '../utils/logger.ts';
import { normalizeTicker, type MarketDataProvider } from './types.ts';

/**
 * Caching decorator for any MarketDataProvider. Keys are
 * `company:<TICKER>`; errors pass through uncached.
 */
export class CachedProvider implements MarketDataProvider {
  readonly name: string;

  constructor(
    private readonly inner: MarketDataProvider,
    private readonly ttlMs: number = CACHE_TTL.COMPANY,
    readonly cache: SessionCache = new SessionCache()
  ) {
    this.name = `${inner.name} (cached)`;
  }

  static key(ticker: string): string {
    return `company:${normalizeTicker(ticker)}`;
  }

  async fetchCompany(ticker: string): Promise<CompanyFinancials> {
    const key = CachedProvider.key(ticker);
    const age = this.cache.getAge(key);

    const data = await this.cache.getOrFetch(
      key,
      () => this.inner.fetchCompany(ticker),
      this.ttlMs
    );

    if (age !== undefined && age < this.ttlMs) {
      logger.debug(`[Cache] hit ${key} (age ${Math.round(age / 1000)}s)`);
    } else {
      logger.debug(`[Cache] miss ${key}`);
    }
    return data;
  }

  invalidate(ticker: string): boolean {
    return this.cache.invalidate(CachedProvider.key(ticker));
  }
}
