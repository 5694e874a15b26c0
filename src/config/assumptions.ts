import type { AssumptionSet } from '../types/index.ts';
import { ConfigError } from './index.ts';

export interface AssumptionOverrides {
  taxRate?: number;
  riskFreeRate?: number;
  marketRiskPremium?: number;
  beta?: number;
  costOfDebt?: number;
  perpetualGrowthRate?: number;
  growthRates?: number[];
}

/**
 * Parse one rate from the command line. "8%" and "0.08" both mean 0.08.
 */
export function parseRate(raw: string): number {
  const text = raw.trim();
  const isPercent = text.endsWith('%');
  const value = Number(isPercent ? text.slice(0, -1) : text);

  if (text === '' || !Number.isFinite(value)) {
    throw new ConfigError(`Invalid rate: "${raw}"`);
  }
  return isPercent ? value / 100 : value;
}

/** Comma-separated growth rates, one per projection year */
export function parseRateList(raw: string): number[] {
  return raw.split(',').map(parseRate);
}

/**
 * Layer a run's assumptions: config defaults, then the provider's beta,
 * then explicit overrides. Overriding the growth rates also sets the
 * projection horizon to their count.
 */
export function mergeAssumptions(
  defaults: AssumptionSet,
  overrides: AssumptionOverrides = {},
  providerBeta?: number | null
): AssumptionSet {
  const growthRates = overrides.growthRates ?? defaults.growthRates;

  return {
    taxRate: overrides.taxRate ?? defaults.taxRate,
    riskFreeRate: overrides.riskFreeRate ?? defaults.riskFreeRate,
    marketRiskPremium: overrides.marketRiskPremium ?? defaults.marketRiskPremium,
    beta: overrides.beta ?? providerBeta ?? defaults.beta,
    costOfDebt: overrides.costOfDebt ?? defaults.costOfDebt,
    perpetualGrowthRate:
      overrides.perpetualGrowthRate ?? defaults.perpetualGrowthRate,
    growthRates: [...growthRates],
    projectionYears: overrides.growthRates
      ? overrides.growthRates.length
      : defaults.projectionYears,
  };
}
