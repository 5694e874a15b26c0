/**
 * Analyze Command
 *
 * Fetches one company, checks data quality, runs the DCF and prints the
 * valuation. Saves the run to history when Supabase is configured.
 */

import chalk from 'chalk';
import { getValuationConfig, toAssumptionSet } from '../config/index.ts';
import { computeSensitivityGrid, ValuationStageError } from '../engine/index.ts';
import { normalizeTicker, type MarketDataProvider } from '../providers/index.ts';
import { createRunStore, isConfigured } from '../storage/supabase.ts';
import type { AnalyzeOptions, ValuationReport } from '../types/index.ts';
import { logger } from '../utils/logger.ts';
import {
  renderProjection,
  renderQuality,
  renderSensitivity,
  renderSummary,
  renderWacc,
} from './render.ts';
import {
  errorMessage,
  inspectCompany,
  resolveProvider,
  toOverrides,
  valueInspected,
  type CompanyInspection,
} from './shared.ts';

export async function runAnalyze(
  ticker: string,
  options: AnalyzeOptions,
  provider: MarketDataProvider = resolveProvider(options.input)
): Promise<ValuationReport | null> {
  logger.setVerbose(options.verbose);
  logger.setStderr(options.json);
  const symbol = normalizeTicker(ticker);
  const config = getValuationConfig();

  if (!options.json) {
    logger.header(`DCF Valuation: ${symbol}`);
    logger.info(`Source: ${provider.name}`);
  }

  let inspection: CompanyInspection;
  try {
    inspection = await inspectCompany(provider, symbol);
  } catch (error) {
    logger.error(`Failed to fetch data for ${symbol}: ${errorMessage(error)}`);
    process.exitCode = 1;
    return null;
  }

  const { quality } = inspection;
  const { snapshot, history } = inspection.financials;

  if (!options.json) {
    for (const line of renderQuality(quality)) {
      console.log(line);
    }
  }

  let report: ValuationReport;
  try {
    report = valueInspected(
      inspection,
      toAssumptionSet(config.assumptions),
      toOverrides(options)
    ).report;
  } catch (error) {
    if (error instanceof ValuationStageError) {
      logger.error(`Valuation failed at ${error.stage}: ${error.cause.message}`);
      process.exitCode = 1;
      return null;
    }
    throw error;
  }

  const grid = options.sensitivity
    ? computeSensitivityGrid(snapshot, history, report.assumptions)
    : null;

  if (options.json) {
    console.log(JSON.stringify({ report, quality, sensitivity: grid }, null, 2));
  } else {
    console.log();
    console.log(renderSummary(report));
    console.log(chalk.bold('\n  Discount rate (WACC)'));
    console.log(renderWacc(report));
    console.log(chalk.bold('\n  Projected free cash flow'));
    console.log(renderProjection(report));
    if (grid) {
      console.log(chalk.bold('\n  Intrinsic value sensitivity'));
      console.log(renderSensitivity(grid));
    }
    if (report.irr === null) {
      logger.debug('IRR not available for this cash flow profile');
    }
  }

  if (options.dryRun) {
    logger.debug('Dry run: not saving to history');
  } else if (!isConfigured()) {
    logger.debug('History not configured (SUPABASE_URL / SUPABASE_SERVICE_KEY)');
  } else {
    const saved = await createRunStore(config.history.table).saveRun(
      report,
      quality
    );
    if (saved && !options.json) {
      logger.success(`Saved run for ${symbol} to history`);
    }
  }

  return report;
}
