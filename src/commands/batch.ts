/**
 * Batch Command
 *
 * Values a list of tickers and ranks them by upside. A failed ticker is
 * reported and skipped; the rest of the batch still runs.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { getValuationConfig, toAssumptionSet } from '../config/index.ts';
import type { AssumptionOverrides } from '../config/assumptions.ts';
import { ValuationStageError } from '../engine/index.ts';
import { normalizeTicker, type MarketDataProvider } from '../providers/index.ts';
import { createRunStore, isConfigured } from '../storage/supabase.ts';
import type { AssumptionSet, BatchOptions } from '../types/index.ts';
import { formatMultiple, formatPct, formatPrice, formatRate } from '../utils/format.ts';
import { logger } from '../utils/logger.ts';
import { colorRecommendation } from './render.ts';
import {
  errorMessage,
  getDefaultProvider,
  toOverrides,
  valueCompany,
  type CompanyValuation,
} from './shared.ts';

export interface BatchFailure {
  ticker: string;
  reason: string;
}

export interface BatchResult {
  valuations: CompanyValuation[];
  failures: BatchFailure[];
}

/** "aapl, msft,,GOOG" -> ['AAPL', 'MSFT', 'GOOG'], first occurrence wins */
export function parseTickerList(raw: string): string[] {
  const tickers = raw
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean)
    .map(normalizeTicker);
  return [...new Set(tickers)];
}

function describeFailure(error: unknown): string {
  if (error instanceof ValuationStageError) {
    return `${error.stage}: ${error.cause.message}`;
  }
  return errorMessage(error);
}

/**
 * Value tickers in groups of `concurrency`, returning successes ranked by
 * upside (highest first) and failures in input order.
 */
export async function valueTickers(
  provider: MarketDataProvider,
  tickers: string[],
  defaults: AssumptionSet,
  overrides: AssumptionOverrides,
  concurrency = 5
): Promise<BatchResult> {
  const valuations: CompanyValuation[] = [];
  const failures: BatchFailure[] = [];
  const batchSize = Number.isFinite(concurrency)
    ? Math.max(1, Math.floor(concurrency))
    : 1;

  for (let i = 0; i < tickers.length; i += batchSize) {
    const batch = tickers.slice(i, i + batchSize);

    const settled = await Promise.allSettled(
      batch.map((ticker) => valueCompany(provider, ticker, defaults, overrides))
    );

    settled.forEach((outcome, j) => {
      const ticker = batch[j] ?? '';
      if (outcome.status === 'fulfilled') {
        const { report } = outcome.value;
        valuations.push(outcome.value);
        logger.valuation(report.ticker, report.upsidePct, report.recommendation);
      } else {
        failures.push({ ticker, reason: describeFailure(outcome.reason) });
      }
    });
  }

  valuations.sort((a, b) => b.report.upsidePct - a.report.upsidePct);
  return { valuations, failures };
}

export function renderRanking(valuations: CompanyValuation[]): string {
  const table = new Table({
    head: ['#', 'Ticker', 'Price', 'Intrinsic', 'Upside', 'WACC', 'EV/FCF', 'Quality', 'Call'].map(
      (h) => chalk.magenta(h)
    ),
    style: { head: [], border: ['gray'] },
  });

  valuations.forEach(({ report, quality }, i) => {
    table.push([
      String(i + 1),
      chalk.bold(report.ticker),
      formatPrice(report.currentMarketValue),
      formatPrice(report.intrinsicValuePerShare),
      formatPct(report.upsidePct),
      formatRate(report.wacc.wacc, 1),
      formatMultiple(report.evFcfMultiple),
      quality.grade,
      colorRecommendation(report.recommendation),
    ]);
  });

  return table.toString();
}

export async function runBatch(
  tickerList: string,
  options: BatchOptions,
  provider: MarketDataProvider = getDefaultProvider()
): Promise<BatchResult> {
  logger.setVerbose(options.verbose);
  const config = getValuationConfig();
  const tickers = parseTickerList(tickerList);

  if (tickers.length === 0) {
    logger.error('No tickers given');
    process.exitCode = 1;
    return { valuations: [], failures: [] };
  }

  logger.header(`DCF Batch: ${tickers.length} tickers`);
  logger.info(`Valuing ${tickers.length} tickers (concurrency: ${options.concurrency})...`);

  const result = await valueTickers(
    provider,
    tickers,
    toAssumptionSet(config.assumptions),
    toOverrides({ growth: options.growth }),
    options.concurrency
  );

  if (result.valuations.length > 0) {
    console.log(renderRanking(result.valuations));
  }

  for (const failure of result.failures) {
    logger.warn(`${failure.ticker} skipped: ${failure.reason}`);
  }

  logger.success(
    `Valued ${result.valuations.length}/${tickers.length} tickers` +
      (result.failures.length > 0 ? ` (${result.failures.length} failed)` : '')
  );

  if (result.valuations.length === 0) {
    process.exitCode = 1;
  }

  if (!options.dryRun && isConfigured() && result.valuations.length > 0) {
    const store = createRunStore(config.history.table);
    let saved = 0;
    for (const { report, quality } of result.valuations) {
      if (await store.saveRun(report, quality)) saved++;
    }
    logger.info(`Saved ${saved} runs to history`);
  }

  return result;
}
