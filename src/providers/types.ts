import type { CompanyFinancials } from '../types/index.ts';

/**
 * Supplies the engine's inputs. Retry, rate limiting and caching live
 * behind this interface, never in the engine.
 */
export interface MarketDataProvider {
  readonly name: string;
  fetchCompany(ticker: string): Promise<CompanyFinancials>;
}

export class ProviderError extends Error {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    readonly ticker: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${ticker}: ${message}`, options);
    this.name = 'ProviderError';
  }
}

export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}
