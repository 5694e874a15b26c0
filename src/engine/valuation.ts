/**
 * DCF valuation pipeline
 *
 * Runs the stages in a fixed order, threading each typed result into the
 * next:
 *
 *   historical FCF -> WACC -> projection -> discounting -> terminal value
 *     -> equity value -> market comparison
 *
 * Any engine error aborts the run and is rethrown as a ValuationStageError
 * naming the stage. IRR is supplementary: if its root search fails the
 * report carries `irr: null` instead.
 */

import type {
  AssumptionSet,
  CompanySnapshot,
  HistoricalQuarter,
  ValuationReport,
  ValuationStage,
} from "../types/index.ts";
import {
  computeTTMFreeCashFlow,
  discountSeries,
  projectFreeCashFlows,
} from "./cash-flow.ts";
import {
  classifyRecommendation,
  computeUpsidePct,
  perShareIntrinsicValue,
  reconcileEquityValue,
} from "./equity.ts";
import {
  InsufficientDataError,
  NonConvergenceError,
  ValuationError,
  ValuationStageError,
} from "./errors.ts";
import { computeInternalRateOfReturn } from "./irr.ts";
import { computeTerminalValue } from "./terminal.ts";
import { computeWacc } from "./wacc.ts";

function runStage<T>(stage: ValuationStage, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof ValuationError) {
      throw new ValuationStageError(stage, error);
    }
    throw error;
  }
}

/**
 * Growth rates for the explicit horizon. A declared `projectionYears`
 * must match the number of rates; nothing is padded or truncated.
 */
export function resolveGrowthRates(assumptions: AssumptionSet): number[] {
  const { growthRates, projectionYears } = assumptions;

  if (growthRates.length === 0) {
    throw new InsufficientDataError("at least one growth rate is required");
  }
  if (projectionYears !== undefined && projectionYears !== growthRates.length) {
    throw new InsufficientDataError(
      `projection horizon is ${projectionYears} years but ` +
        `${growthRates.length} growth rates were supplied`
    );
  }
  return growthRates;
}

/**
 * Market enterprise value used as the IRR outlay and the EV/FCF numerator:
 * market cap + total debt - cash.
 */
export function marketEnterpriseValue(snapshot: CompanySnapshot): number {
  return (
    snapshot.sharesOutstanding * snapshot.currentPrice +
    snapshot.totalDebt -
    snapshot.cash
  );
}

/**
 * IRR of buying the whole enterprise at market EV and receiving the
 * projected FCF, with the terminal value landing in the final year.
 */
function computeImpliedIrr(
  marketEv: number,
  projectedFcf: number[],
  terminalValue: number
): number | null {
  if (marketEv <= 0) return null;

  const inflows = projectedFcf.map((fcf, i) =>
    i === projectedFcf.length - 1 ? fcf + terminalValue : fcf
  );

  try {
    return computeInternalRateOfReturn([-marketEv, ...inflows]);
  } catch (error) {
    if (error instanceof NonConvergenceError) {
      return null;
    }
    throw error;
  }
}

export function runValuation(
  snapshot: CompanySnapshot,
  history: HistoricalQuarter[],
  assumptions: AssumptionSet
): ValuationReport {
  const ttm = runStage("historical-fcf", () => {
    const result = computeTTMFreeCashFlow(history);
    if (result.quartersUsed === 0) {
      throw new InsufficientDataError(
        `no quarterly cash flow history for ${snapshot.ticker}`
      );
    }
    return result;
  });

  const wacc = runStage("wacc", () => computeWacc(snapshot, assumptions));

  const projectedFcf = runStage("projection", () =>
    projectFreeCashFlows(ttm.ttmFcf, resolveGrowthRates(assumptions))
  );
  const horizon = projectedFcf.length;

  const discounted = runStage("discounting", () =>
    discountSeries(projectedFcf, wacc.wacc)
  );

  const terminal = runStage("terminal-value", () =>
    computeTerminalValue(
      projectedFcf.at(-1) ?? ttm.ttmFcf,
      assumptions.perpetualGrowthRate,
      wacc.wacc,
      horizon
    )
  );

  const enterpriseValue = discounted.total + terminal.presentValue;

  const { equityValue, intrinsicValuePerShare } = runStage(
    "equity-value",
    () => {
      const equity = reconcileEquityValue(
        enterpriseValue,
        snapshot.totalDebt,
        snapshot.cash
      );
      return {
        equityValue: equity,
        intrinsicValuePerShare: perShareIntrinsicValue(
          equity,
          snapshot.sharesOutstanding
        ),
      };
    }
  );

  const upsidePct = runStage("market-comparison", () =>
    computeUpsidePct(intrinsicValuePerShare, snapshot.currentPrice)
  );

  const marketEv = marketEnterpriseValue(snapshot);

  return {
    ticker: snapshot.ticker,
    ttm,
    wacc,
    projectedFcf,
    presentValues: discounted.presentValues,
    sumOfPresentValues: discounted.total,
    terminalValue: terminal.terminalValue,
    pvTerminalValue: terminal.presentValue,
    terminalValueShare:
      enterpriseValue !== 0 ? (terminal.presentValue / enterpriseValue) * 100 : 0,
    enterpriseValue,
    equityValue,
    intrinsicValuePerShare,
    currentMarketValue: snapshot.currentPrice,
    upsidePct,
    recommendation: classifyRecommendation(upsidePct),
    irr: computeImpliedIrr(marketEv, projectedFcf, terminal.terminalValue),
    evFcfMultiple: ttm.ttmFcf > 0 ? marketEv / ttm.ttmFcf : null,
    // Copies, so later changes to the caller's inputs leave the report alone
    assumptions: { ...assumptions, growthRates: [...assumptions.growthRates] },
    snapshot: { ...snapshot },
  };
}
