import { getCacheTtlMs, getRetryPolicy, getValuationConfig } from '../config/index.ts';
import {
  mergeAssumptions,
  parseRateList,
  type AssumptionOverrides,
} from '../config/assumptions.ts';
import { assessDataQuality, runValuation } from '../engine/index.ts';
import {
  CachedProvider,
  JsonFileProvider,
  YahooProvider,
  type MarketDataProvider,
} from '../providers/index.ts';
import type {
  AnalyzeOptions,
  AssumptionSet,
  CompanyFinancials,
  DataQualityReport,
  ValuationReport,
} from '../types/index.ts';

let defaultProvider: MarketDataProvider | null = null;

/**
 * Yahoo behind the session cache, shared across commands in one process
 */
export function getDefaultProvider(): MarketDataProvider {
  if (defaultProvider) return defaultProvider;

  const config = getValuationConfig();
  defaultProvider = new CachedProvider(
    new YahooProvider({
      quarters: config.provider.quarters,
      retry: getRetryPolicy(),
    }),
    getCacheTtlMs()
  );
  return defaultProvider;
}

export function resolveProvider(input?: string): MarketDataProvider {
  return input ? new JsonFileProvider(input) : getDefaultProvider();
}

export function toOverrides(
  options: Partial<Omit<AnalyzeOptions, 'sensitivity' | 'json' | 'dryRun' | 'verbose'>>
): AssumptionOverrides {
  return {
    taxRate: options.taxRate,
    riskFreeRate: options.riskFree,
    marketRiskPremium: options.mrp,
    beta: options.beta,
    costOfDebt: options.costOfDebt,
    perpetualGrowthRate: options.perpetualGrowth,
    growthRates: options.growth ? parseRateList(options.growth) : undefined,
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface CompanyInspection {
  financials: CompanyFinancials;
  quality: DataQualityReport;
}

export interface CompanyValuation extends CompanyInspection {
  report: ValuationReport;
}

/** Fetch one company and grade its data. Provider errors propagate. */
export async function inspectCompany(
  provider: MarketDataProvider,
  ticker: string
): Promise<CompanyInspection> {
  const financials = await provider.fetchCompany(ticker);
  return {
    financials,
    quality: assessDataQuality(financials.snapshot, financials.history),
  };
}

/**
 * Value an inspected company. The provider beta sits between the defaults
 * and the overrides; engine errors propagate as ValuationStageError.
 */
export function valueInspected(
  { financials, quality }: CompanyInspection,
  defaults: AssumptionSet,
  overrides: AssumptionOverrides
): CompanyValuation {
  const { snapshot, history } = financials;
  const assumptions = mergeAssumptions(defaults, overrides, snapshot.beta);

  return {
    financials,
    quality,
    report: runValuation(snapshot, history, assumptions),
  };
}

/**
 * Fetch, check and value one company. The data quality report is
 * informational only.
 */
export async function valueCompany(
  provider: MarketDataProvider,
  ticker: string,
  defaults: AssumptionSet,
  overrides: AssumptionOverrides
): Promise<CompanyValuation> {
  return valueInspected(await inspectCompany(provider, ticker), defaults, overrides);
}
