import type {
  AssumptionSet,
  CompanySnapshot,
  WaccResult,
} from "../types/index.ts";
import { InsufficientDataError } from "./errors.ts";

/**
 * Weighted average cost of capital.
 *
 * Cost of equity comes from CAPM (rf + beta * MRP); the assumption set's
 * beta wins over the snapshot's. Weights use the market value of equity
 * (shares * price) and the book value of total debt.
 */
export function computeWacc(
  snapshot: CompanySnapshot,
  assumptions: AssumptionSet
): WaccResult {
  const beta = assumptions.beta ?? snapshot.beta;
  if (beta === null || beta === undefined) {
    throw new InsufficientDataError(
      `no beta available for ${snapshot.ticker}`
    );
  }

  const costOfEquity =
    assumptions.riskFreeRate + beta * assumptions.marketRiskPremium;
  const afterTaxCostOfDebt =
    assumptions.costOfDebt * (1 - assumptions.taxRate);

  const marketCapitalization =
    snapshot.sharesOutstanding * snapshot.currentPrice;
  const totalCapital = snapshot.totalDebt + marketCapitalization;

  if (totalCapital === 0) {
    throw new InsufficientDataError(
      "total capital is zero, cannot weight cost of equity and debt"
    );
  }

  const equityWeight = marketCapitalization / totalCapital;
  const debtWeight = snapshot.totalDebt / totalCapital;

  return {
    beta,
    costOfEquity,
    afterTaxCostOfDebt,
    marketCapitalization,
    totalCapital,
    equityWeight,
    debtWeight,
    wacc: equityWeight * costOfEquity + debtWeight * afterTaxCostOfDebt,
  };
}
