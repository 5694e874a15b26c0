import type {
  AssumptionSet,
  CompanySnapshot,
  HistoricalQuarter,
  SensitivityGrid,
} from "../types/index.ts";
import {
  computeTTMFreeCashFlow,
  discountSeries,
  projectFreeCashFlows,
} from "./cash-flow.ts";
import { perShareIntrinsicValue, reconcileEquityValue } from "./equity.ts";
import { InsufficientDataError } from "./errors.ts";
import { computeTerminalValue } from "./terminal.ts";
import { resolveGrowthRates } from "./valuation.ts";
import { computeWacc } from "./wacc.ts";

export const DEFAULT_WACC_SHIFTS = [-0.02, -0.01, 0, 0.01, 0.02];
export const DEFAULT_GROWTH_SHIFTS = [-0.01, -0.005, 0, 0.005, 0.01];

/**
 * Intrinsic value per share across discount-rate and perpetual-growth
 * shifts around the base case. Rows follow `waccShifts`, columns
 * `growthShifts`. Cells where the shifted discount rate does not exceed
 * the shifted growth have no finite terminal value and are null.
 */
export function computeSensitivityGrid(
  snapshot: CompanySnapshot,
  history: HistoricalQuarter[],
  assumptions: AssumptionSet,
  waccShifts: number[] = DEFAULT_WACC_SHIFTS,
  growthShifts: number[] = DEFAULT_GROWTH_SHIFTS
): SensitivityGrid {
  const ttm = computeTTMFreeCashFlow(history);
  if (ttm.quartersUsed === 0) {
    throw new InsufficientDataError(
      `no quarterly cash flow history for ${snapshot.ticker}`
    );
  }

  const baseRate = computeWacc(snapshot, assumptions).wacc;
  const projected = projectFreeCashFlows(
    ttm.ttmFcf,
    resolveGrowthRates(assumptions)
  );
  const finalYearFcf = projected.at(-1) ?? ttm.ttmFcf;

  const rows = waccShifts.map((waccShift) =>
    growthShifts.map((growthShift) => {
      const discountRate = baseRate + waccShift;
      const perpetualGrowthRate = assumptions.perpetualGrowthRate + growthShift;

      if (discountRate <= perpetualGrowthRate || discountRate <= -1) {
        return { discountRate, perpetualGrowthRate, intrinsicValuePerShare: null };
      }

      const pvFcf = discountSeries(projected, discountRate).total;
      const terminal = computeTerminalValue(
        finalYearFcf,
        perpetualGrowthRate,
        discountRate,
        projected.length
      );
      const equity = reconcileEquityValue(
        pvFcf + terminal.presentValue,
        snapshot.totalDebt,
        snapshot.cash
      );

      return {
        discountRate,
        perpetualGrowthRate,
        intrinsicValuePerShare: perShareIntrinsicValue(
          equity,
          snapshot.sharesOutstanding
        ),
      };
    })
  );

  return { waccShifts, growthShifts, rows };
}
