import type { Recommendation } from "../types/index.ts";
import { InsufficientDataError } from "./errors.ts";

/**
 * Recommendation tiers, checked top-down; first match wins.
 * Boundaries belong to the higher tier.
 */
export const RECOMMENDATION_TIERS: ReadonlyArray<{
  minUpsidePct: number;
  recommendation: Recommendation;
}> = [
  { minUpsidePct: 20, recommendation: "STRONG BUY" },
  { minUpsidePct: 10, recommendation: "BUY" },
  { minUpsidePct: -10, recommendation: "HOLD" },
];

/** EV - debt + cash. Negative results are returned as-is. */
export function reconcileEquityValue(
  enterpriseValue: number,
  totalDebt: number,
  cash: number
): number {
  return enterpriseValue - totalDebt + cash;
}

export function perShareIntrinsicValue(
  equityValue: number,
  sharesOutstanding: number
): number {
  if (sharesOutstanding <= 0) {
    throw new InsufficientDataError(
      `shares outstanding must be positive (got ${sharesOutstanding})`
    );
  }
  return equityValue / sharesOutstanding;
}

/** Percent upside of intrinsic value over the market price */
export function computeUpsidePct(
  intrinsicValue: number,
  currentPrice: number
): number {
  if (currentPrice <= 0) {
    throw new InsufficientDataError(
      `current price must be positive (got ${currentPrice})`
    );
  }
  return ((intrinsicValue - currentPrice) / currentPrice) * 100;
}

export function classifyRecommendation(upsidePct: number): Recommendation {
  for (const tier of RECOMMENDATION_TIERS) {
    if (upsidePct >= tier.minUpsidePct) {
      return tier.recommendation;
    }
  }
  return "SELL";
}
