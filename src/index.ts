#!/usr/bin/env tsx
/**
 * DCF Valuation CLI
 * v1.0.0 - Discounted cash flow valuation for listed companies
 *
 * Usage: tsx src/index.ts <command> [options]
 */

// Suppress dotenv logging noise
process.env.DOTENV_CONFIG_QUIET = 'true';

import { config } from 'dotenv';
import { join } from 'path';
import { Command } from 'commander';

config({ path: join(process.cwd(), '.env') });
config({ path: join(process.cwd(), '.env.local') });

import { runAnalyze } from './commands/analyze.ts';
import { runBatch } from './commands/batch.ts';
import { runDefaults } from './commands/defaults.ts';
import { runHistory } from './commands/history.ts';
import { parsePositiveInt } from './commands/options.ts';
import { errorMessage } from './commands/shared.ts';
import { parseRate } from './config/assumptions.ts';
import { ConfigError } from './config/index.ts';
import { logger } from './utils/logger.ts';

const program = new Command();

program
  .name('dcf')
  .description('Discounted cash flow valuation engine')
  .version('1.0.0');

// ============================================================================
// ANALYZE: Value one company
// ============================================================================
program
  .command('analyze <ticker>')
  .description('Run a DCF valuation for one ticker')
  .option('--input <file>', 'Read company data from a JSON file instead of Yahoo')
  .option('--growth <list>', 'Comma-separated growth rates, e.g. 8%,7%,6%')
  .option('--perpetual-growth <rate>', 'Perpetual growth rate', parseRate)
  .option('--risk-free <rate>', 'Risk-free rate', parseRate)
  .option('--mrp <rate>', 'Market risk premium', parseRate)
  .option('--beta <n>', 'Override beta', (v: string) => Number(v))
  .option('--cost-of-debt <rate>', 'Pre-tax cost of debt', parseRate)
  .option('--tax-rate <rate>', 'Corporate tax rate', parseRate)
  .option('--sensitivity', 'Show WACC x growth sensitivity grid', false)
  .option('--json', 'Print the report as JSON', false)
  .option('--dry-run', 'Do not save to history', false)
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (ticker: string, opts) => {
    await runAnalyze(ticker, {
      input: opts.input,
      growth: opts.growth,
      perpetualGrowth: opts.perpetualGrowth,
      riskFree: opts.riskFree,
      mrp: opts.mrp,
      beta: opts.beta,
      costOfDebt: opts.costOfDebt,
      taxRate: opts.taxRate,
      sensitivity: opts.sensitivity,
      json: opts.json,
      dryRun: opts.dryRun,
      verbose: opts.verbose,
    });
  });

// ============================================================================
// BATCH: Value and rank several companies
// ============================================================================
program
  .command('batch <tickers>')
  .description('Value comma-separated tickers and rank them by upside')
  .option('--growth <list>', 'Comma-separated growth rates for every ticker')
  .option('--concurrency <n>', 'Tickers fetched at once', parsePositiveInt, 5)
  .option('--dry-run', 'Do not save to history', false)
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (tickers: string, opts) => {
    await runBatch(tickers, {
      growth: opts.growth,
      concurrency: opts.concurrency,
      dryRun: opts.dryRun,
      verbose: opts.verbose,
    });
  });

// ============================================================================
// DEFAULTS: Show configured assumptions
// ============================================================================
program
  .command('defaults')
  .description('Print the default assumption set')
  .option('--json', 'Print as JSON', false)
  .action((opts) => {
    runDefaults({ json: opts.json });
  });

// ============================================================================
// HISTORY: Stored valuation runs
// ============================================================================
program
  .command('history [ticker]')
  .description('List stored valuation runs')
  .option('--limit <n>', 'Number of runs', parsePositiveInt, 20)
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (ticker: string | undefined, opts) => {
    await runHistory(ticker, { limit: opts.limit, verbose: opts.verbose });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message);
  } else {
    logger.error(`Unexpected error: ${errorMessage(error)}`);
    logger.debug(error instanceof Error ? (error.stack ?? '') : '');
  }
  process.exitCode = 1;
});
