/**
 * History Command
 *
 * Lists past valuation runs from Supabase, newest first.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { getValuationConfig } from '../config/index.ts';
import {
  createRunStore,
  isConfigured,
  type ValuationRunRecord,
} from '../storage/supabase.ts';
import type { HistoryOptions } from '../types/index.ts';
import { formatPct, formatPrice } from '../utils/format.ts';
import { logger } from '../utils/logger.ts';

export function renderHistory(runs: ValuationRunRecord[]): string {
  const table = new Table({
    head: ['Date', 'Ticker', 'Price', 'Intrinsic', 'Upside', 'Call', 'Quality'].map(
      (h) => chalk.magenta(h)
    ),
    style: { head: [], border: ['gray'] },
  });

  for (const run of runs) {
    table.push([
      run.created_at.slice(0, 10),
      chalk.bold(run.ticker),
      run.current_price === null ? 'n/a' : formatPrice(run.current_price),
      run.intrinsic_value_per_share === null
        ? 'n/a'
        : formatPrice(run.intrinsic_value_per_share),
      run.upside_pct === null ? 'n/a' : formatPct(run.upside_pct),
      run.recommendation,
      run.data_quality ?? '-',
    ]);
  }

  return table.toString();
}

export async function runHistory(
  ticker: string | undefined,
  options: HistoryOptions
): Promise<void> {
  logger.setVerbose(options.verbose);

  if (!isConfigured()) {
    logger.error(
      'History needs SUPABASE_URL and SUPABASE_SERVICE_KEY (or SUPABASE_ANON_KEY)'
    );
    process.exitCode = 1;
    return;
  }

  const store = createRunStore(getValuationConfig().history.table);
  const runs = await store.listRuns(ticker, options.limit);

  logger.header(ticker ? `Valuation history: ${ticker.toUpperCase()}` : 'Valuation history');
  if (runs.length === 0) {
    logger.info('No runs recorded');
    return;
  }
  console.log(renderHistory(runs));
}
