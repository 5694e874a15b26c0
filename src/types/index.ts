import { z } from "zod";

// Amounts are in millions of the reporting currency unless the field name
// says per-share. Rates are decimals, upside is in percent points.

export const CompanySnapshot = z.object({
  ticker: z.string().min(1),
  companyName: z.string(),
  currentPrice: z.number(),
  sharesOutstanding: z.number(),
  totalDebt: z.number(),
  cash: z.number(),
  beta: z.number().nullable().optional(),
  // Balance sheet detail, display only
  shortTermDebt: z.number().optional(),
  longTermDebt: z.number().optional(),
  totalAssets: z.number().optional(),
  totalLiabilities: z.number().optional(),
  shareholdersEquity: z.number().optional(),
  balanceSheetDate: z.string().optional(),
});
export type CompanySnapshot = z.infer<typeof CompanySnapshot>;

export const HistoricalQuarter = z.object({
  label: z.string(),
  operatingCashFlow: z.number(),
  // Outflow, recorded as a non-positive number
  capitalExpenditure: z.number(),
  netIncome: z.number(),
});
export type HistoricalQuarter = z.infer<typeof HistoricalQuarter>;

export const AssumptionSet = z.object({
  taxRate: z.number(),
  riskFreeRate: z.number(),
  marketRiskPremium: z.number(),
  beta: z.number().nullable().optional(),
  costOfDebt: z.number(),
  perpetualGrowthRate: z.number(),
  growthRates: z.array(z.number()),
  projectionYears: z.number().int().positive().optional(),
});
export type AssumptionSet = z.infer<typeof AssumptionSet>;

// What a data provider hands to the engine
export const CompanyFinancials = z.object({
  snapshot: CompanySnapshot,
  history: z.array(HistoricalQuarter),
  source: z.string(),
});
export type CompanyFinancials = z.infer<typeof CompanyFinancials>;

export const Recommendation = z.enum(["STRONG BUY", "BUY", "HOLD", "SELL"]);
export type Recommendation = z.infer<typeof Recommendation>;

export type ValuationStage =
  | "historical-fcf"
  | "wacc"
  | "projection"
  | "discounting"
  | "terminal-value"
  | "equity-value"
  | "market-comparison";

export interface TrailingCashFlow {
  ttmFcf: number;
  ttmOperatingCashFlow: number;
  ttmCapitalExpenditure: number;
  ttmNetIncome: number;
  quartersUsed: number;
  /** One entry per quarter of the full history, oldest first */
  quarterlyFcf: number[];
}

export interface WaccResult {
  beta: number;
  costOfEquity: number;
  afterTaxCostOfDebt: number;
  marketCapitalization: number;
  totalCapital: number;
  equityWeight: number;
  debtWeight: number;
  wacc: number;
}

export interface DiscountedSeries {
  presentValues: number[];
  total: number;
}

export interface TerminalValueResult {
  terminalValue: number;
  presentValue: number;
}

export interface ValuationReport {
  ticker: string;
  ttm: TrailingCashFlow;
  wacc: WaccResult;
  projectedFcf: number[];
  presentValues: number[];
  sumOfPresentValues: number;
  terminalValue: number;
  pvTerminalValue: number;
  /** PV of terminal value as a percentage of enterprise value */
  terminalValueShare: number;
  enterpriseValue: number;
  equityValue: number;
  intrinsicValuePerShare: number;
  currentMarketValue: number;
  upsidePct: number;
  recommendation: Recommendation;
  irr: number | null;
  evFcfMultiple: number | null;
  assumptions: AssumptionSet;
  snapshot: CompanySnapshot;
}

export const DataQualityGrade = z.enum(["EXCELLENT", "GOOD", "FAIR", "POOR"]);
export type DataQualityGrade = z.infer<typeof DataQualityGrade>;

export interface DataQualityReport {
  grade: DataQualityGrade;
  issues: string[];
  warnings: string[];
  usable: boolean;
}

export interface SensitivityCell {
  discountRate: number;
  perpetualGrowthRate: number;
  intrinsicValuePerShare: number | null;
}

export interface SensitivityGrid {
  waccShifts: number[];
  growthShifts: number[];
  rows: SensitivityCell[][];
}

// CLI option bags
export interface AnalyzeOptions {
  input?: string;
  growth?: string;
  perpetualGrowth?: number;
  riskFree?: number;
  mrp?: number;
  beta?: number;
  costOfDebt?: number;
  taxRate?: number;
  sensitivity: boolean;
  json: boolean;
  dryRun: boolean;
  verbose: boolean;
}

export interface BatchOptions {
  growth?: string;
  concurrency: number;
  dryRun: boolean;
  verbose: boolean;
}

export interface HistoryOptions {
  limit: number;
  verbose: boolean;
}
