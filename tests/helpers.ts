/**
 * Shared builders for the Acme scenario used across engine tests.
 *
 * Acme: 10M shares at $50, $100M debt, $50M cash, four quarters of
 * 15 OCF / -2.5 capex (TTM FCF 50).
 */
import type {
  AssumptionSet,
  CompanySnapshot,
  HistoricalQuarter,
} from '../src/types/index.ts';

export function createSnapshot(
  overrides: Partial<CompanySnapshot> = {}
): CompanySnapshot {
  return {
    ticker: 'ACME',
    companyName: 'Acme Corp',
    currentPrice: 50,
    sharesOutstanding: 10,
    totalDebt: 100,
    cash: 50,
    beta: 1.2,
    ...overrides,
  };
}

export function createQuarters(
  count = 4,
  quarter: Partial<HistoricalQuarter> = {}
): HistoricalQuarter[] {
  return Array.from({ length: count }, (_, i) => ({
    label: `Q${i + 1}`,
    operatingCashFlow: 15,
    capitalExpenditure: -2.5,
    netIncome: 10,
    ...quarter,
  }));
}

export function createAssumptions(
  overrides: Partial<AssumptionSet> = {}
): AssumptionSet {
  return {
    taxRate: 0.21,
    riskFreeRate: 0.04,
    marketRiskPremium: 0.08,
    beta: null,
    costOfDebt: 0.05,
    perpetualGrowthRate: 0.03,
    growthRates: [0.1, 0.08, 0.06],
    ...overrides,
  };
}
