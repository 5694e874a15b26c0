import type {
  DiscountedSeries,
  HistoricalQuarter,
  TrailingCashFlow,
} from "../types/index.ts";
import { DomainError } from "./errors.ts";

/** Quarters summed into a trailing-twelve-month figure */
export const TTM_QUARTERS = 4;

const sum = (values: number[]): number =>
  values.reduce((total, v) => total + v, 0);

/**
 * Aggregate trailing-twelve-month free cash flow.
 *
 * Capex is stored as a non-positive outflow, so FCF = OCF + capex.
 * With fewer than four quarters the whole history is the window;
 * an empty history yields zeros and `quartersUsed: 0`.
 */
export function computeTTMFreeCashFlow(
  history: HistoricalQuarter[]
): TrailingCashFlow {
  const quarterlyFcf = history.map(
    (q) => q.operatingCashFlow + q.capitalExpenditure
  );

  const window = history.slice(-TTM_QUARTERS);
  const ttmOperatingCashFlow = sum(window.map((q) => q.operatingCashFlow));
  const ttmCapitalExpenditure = sum(window.map((q) => q.capitalExpenditure));

  return {
    ttmFcf: ttmOperatingCashFlow + ttmCapitalExpenditure,
    ttmOperatingCashFlow,
    ttmCapitalExpenditure,
    ttmNetIncome: sum(window.map((q) => q.netIncome)),
    quartersUsed: window.length,
    quarterlyFcf,
  };
}

/**
 * Compound the base FCF forward, one growth rate per projection year.
 * Negative and zero rates are taken as given.
 */
export function projectFreeCashFlows(
  ttmFcf: number,
  growthRates: number[]
): number[] {
  const projected: number[] = [];
  let previous = ttmFcf;

  for (const growth of growthRates) {
    previous = previous * (1 + growth);
    projected.push(previous);
  }

  return projected;
}

/**
 * Discount a yearly series at a flat rate: PV_i = v_i / (1 + rate)^i.
 */
export function discountSeries(
  values: number[],
  wacc: number
): DiscountedSeries {
  if (wacc <= -1) {
    throw new DomainError(
      `discount rate must be greater than -100% (got ${wacc})`
    );
  }

  const presentValues = values.map(
    (value, i) => value / Math.pow(1 + wacc, i + 1)
  );

  return { presentValues, total: sum(presentValues) };
}
