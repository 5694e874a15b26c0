import { readFile } from 'fs/promises';
import { CompanyFinancials } from '../types/index.ts';
import { ProviderError, normalizeTicker, type MarketDataProvider } from './types.ts';

/**
 * Validate a decoded JSON document as CompanyFinancials
 */
export function parseCompanyFinancials(
  ticker: string,
  data: unknown
): CompanyFinancials {
  const result = CompanyFinancials.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ProviderError(ticker, `invalid company data (${issues})`);
  }
  return result.data;
}

/**
 * Reads a saved CompanyFinancials document, for offline runs and fixtures.
 * The requested ticker must match the file's snapshot.
 */
export class JsonFileProvider implements MarketDataProvider {
  readonly name = 'JSON file';

  constructor(private readonly path: string) {}

  async fetchCompany(ticker: string): Promise<CompanyFinancials> {
    const symbol = normalizeTicker(ticker);

    let decoded: unknown;
    try {
      decoded = JSON.parse(await readFile(this.path, 'utf-8'));
    } catch (error) {
      throw new ProviderError(symbol, `cannot read ${this.path}`, {
        cause: error,
      });
    }

    const financials = parseCompanyFinancials(symbol, decoded);
    if (normalizeTicker(financials.snapshot.ticker) !== symbol) {
      throw new ProviderError(
        symbol,
        `${this.path} holds data for ${financials.snapshot.ticker}`
      );
    }
    return financials;
  }
}
