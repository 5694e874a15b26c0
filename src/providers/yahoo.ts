import YahooFinance from 'yahoo-finance2';
import { z } from 'zod';
import type {
  CompanyFinancials,
  CompanySnapshot,
  HistoricalQuarter,
} from '../types/index.ts';
import { logger } from '../utils/logger.ts';
import { DEFAULT_RETRY, sleep, withRetry, type RetryPolicy } from '../utils/retry.ts';
import { ProviderError, normalizeTicker, type MarketDataProvider } from './types.ts';

/**
 * The two Yahoo endpoints the provider needs. Results are left as
 * `unknown` and narrowed with zod below, since quote summaries for
 * edge-case tickers regularly miss fields.
 */
export interface YahooClient {
  quoteSummary(symbol: string): Promise<unknown>;
  quarterlyCashFlow(symbol: string, period1: Date): Promise<unknown>;
}

/**
 * Shared yahoo-finance2 instance. v3 requires instantiation; each instance
 * fetches its own crumb, so one per process.
 */
export function createYahooClient(): YahooClient {
  const yahooFinance = new YahooFinance({
    suppressNotices: ['yahooSurvey'],
  });

  return {
    quoteSummary: (symbol) =>
      yahooFinance.quoteSummary(
        symbol,
        {
          modules: [
            'price',
            'summaryDetail',
            'defaultKeyStatistics',
            'financialData',
          ],
        },
        { validateResult: false }
      ),
    quarterlyCashFlow: (symbol, period1) =>
      yahooFinance.fundamentalsTimeSeries(
        symbol,
        { period1, type: 'quarterly', module: 'cash-flow' },
        { validateResult: false }
      ),
  };
}

// Yahoo returns either plain numbers or { raw, fmt } wrappers
const numeric = z.union([
  z.number(),
  z.object({ raw: z.number() }).transform((v) => v.raw),
]);
const optionalNumeric = numeric.nullish();

const summarySchema = z.object({
  price: z
    .object({
      regularMarketPrice: optionalNumeric,
      longName: z.string().nullish(),
      shortName: z.string().nullish(),
    })
    .nullish(),
  summaryDetail: z.object({ beta: optionalNumeric }).nullish(),
  defaultKeyStatistics: z
    .object({
      sharesOutstanding: optionalNumeric,
      beta: optionalNumeric,
    })
    .nullish(),
  financialData: z
    .object({
      currentPrice: optionalNumeric,
      totalDebt: optionalNumeric,
      totalCash: optionalNumeric,
    })
    .nullish(),
});
export type YahooSummary = z.infer<typeof summarySchema>;

function toIsoDate(value: Date | number | string): string {
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  if (typeof value === 'number') {
    // Epoch seconds or milliseconds
    const ms = value < 1e11 ? value * 1000 : value;
    return new Date(ms).toISOString().slice(0, 10);
  }
  return value.slice(0, 10);
}

const cashFlowRowSchema = z.object({
  date: z.union([z.date(), z.number(), z.string()]).transform(toIsoDate),
  operatingCashFlow: optionalNumeric,
  capitalExpenditure: optionalNumeric,
  netIncome: optionalNumeric,
  netIncomeFromContinuingOperations: optionalNumeric,
});
const cashFlowSeriesSchema = z.array(cashFlowRowSchema);
export type YahooCashFlowRow = z.infer<typeof cashFlowRowSchema>;

/** Absolute currency to millions; missing values count as zero */
export function toMillions(value: number | null | undefined): number {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return 0;
  }
  return value / 1_000_000;
}

export function mapSummaryToSnapshot(
  ticker: string,
  summary: YahooSummary
): CompanySnapshot {
  const price =
    summary.financialData?.currentPrice ??
    summary.price?.regularMarketPrice ??
    0;
  const beta =
    summary.defaultKeyStatistics?.beta ?? summary.summaryDetail?.beta ?? null;

  return {
    ticker,
    companyName: summary.price?.longName ?? summary.price?.shortName ?? ticker,
    currentPrice: price,
    sharesOutstanding: toMillions(summary.defaultKeyStatistics?.sharesOutstanding),
    totalDebt: toMillions(summary.financialData?.totalDebt),
    cash: toMillions(summary.financialData?.totalCash),
    beta,
  };
}

/**
 * Quarterly cash flow rows to engine quarters, oldest first, keeping the
 * most recent `maxQuarters`. Capex is forced to a non-positive outflow.
 */
export function mapCashFlowSeries(
  rows: YahooCashFlowRow[],
  maxQuarters: number
): HistoricalQuarter[] {
  return rows
    .filter(
      (row) =>
        row.operatingCashFlow !== null && row.operatingCashFlow !== undefined
    )
    .sort((a, b) => a.date.localeCompare(b.date))
    .slice(-maxQuarters)
    .map((row) => ({
      label: row.date,
      operatingCashFlow: toMillions(row.operatingCashFlow),
      capitalExpenditure: -Math.abs(toMillions(row.capitalExpenditure)),
      netIncome: toMillions(
        row.netIncome ?? row.netIncomeFromContinuingOperations
      ),
    }));
}

/**
 * Rate limiting configuration
 */
const RATE_LIMIT = {
  minIntervalMs: 250, // Spacing between consecutive requests
};

export interface YahooProviderOptions {
  client?: YahooClient;
  quarters?: number;
  retry?: RetryPolicy;
  wait?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * Yahoo Finance data provider with request spacing and retry on rate limits
 */
export class YahooProvider implements MarketDataProvider {
  readonly name = 'Yahoo Finance';

  private readonly client: YahooClient;
  private readonly quarters: number;
  private readonly retry: RetryPolicy;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private lastRequest = 0;

  constructor(options: YahooProviderOptions = {}) {
    this.client = options.client ?? createYahooClient();
    this.quarters = options.quarters ?? 12;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.wait = options.wait ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  private async rateLimit(): Promise<void> {
    const elapsed = Date.now() - this.lastRequest;
    if (elapsed < RATE_LIMIT.minIntervalMs) {
      await this.wait(RATE_LIMIT.minIntervalMs - elapsed);
    }
    this.lastRequest = Date.now();
  }

  private async request(
    fn: () => Promise<unknown>,
    symbol: string,
    requestType: string
  ): Promise<unknown> {
    try {
      return await withRetry(
        async () => {
          await this.rateLimit();
          return fn();
        },
        `${symbol} ${requestType}`,
        this.retry,
        this.wait
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(symbol, `${requestType} request failed: ${message}`, {
        cause: error,
      });
    }
  }

  /** Start of the cash flow window: enough months back for N quarters */
  private cashFlowStart(): Date {
    const start = new Date(this.now());
    start.setMonth(start.getMonth() - (this.quarters + 1) * 3);
    return start;
  }

  async fetchCompany(ticker: string): Promise<CompanyFinancials> {
    const symbol = normalizeTicker(ticker);

    logger.debug(`[Yahoo] Fetching summary for ${symbol}`);
    const rawSummary = await this.request(
      () => this.client.quoteSummary(symbol),
      symbol,
      'summary'
    );
    const summary = summarySchema.safeParse(rawSummary);
    if (!summary.success) {
      throw new ProviderError(
        symbol,
        `unexpected quote summary shape: ${summary.error.issues[0]?.message ?? 'unknown'}`
      );
    }

    logger.debug(`[Yahoo] Fetching quarterly cash flow for ${symbol}`);
    const rawCashFlow = await this.request(
      () => this.client.quarterlyCashFlow(symbol, this.cashFlowStart()),
      symbol,
      'cash flow'
    );
    const rows = cashFlowSeriesSchema.safeParse(rawCashFlow);
    if (!rows.success) {
      throw new ProviderError(
        symbol,
        `unexpected cash flow shape: ${rows.error.issues[0]?.message ?? 'unknown'}`
      );
    }

    const history = mapCashFlowSeries(rows.data, this.quarters);
    logger.debug(`[Yahoo] ${symbol}: ${history.length} quarters of cash flow`);

    return {
      snapshot: mapSummaryToSnapshot(symbol, summary.data),
      history,
      source: this.name,
    };
  }
}
