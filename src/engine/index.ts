export {
  computeTTMFreeCashFlow,
  projectFreeCashFlows,
  discountSeries,
  TTM_QUARTERS,
} from "./cash-flow.ts";
export { computeWacc } from "./wacc.ts";
export { computeTerminalValue } from "./terminal.ts";
export {
  reconcileEquityValue,
  perShareIntrinsicValue,
  computeUpsidePct,
  classifyRecommendation,
  RECOMMENDATION_TIERS,
} from "./equity.ts";
export { computeInternalRateOfReturn, netPresentValue } from "./irr.ts";
export {
  runValuation,
  resolveGrowthRates,
  marketEnterpriseValue,
} from "./valuation.ts";
export {
  computeSensitivityGrid,
  DEFAULT_WACC_SHIFTS,
  DEFAULT_GROWTH_SHIFTS,
} from "./sensitivity.ts";
export { assessDataQuality } from "./quality.ts";
export {
  ValuationError,
  InsufficientDataError,
  DomainError,
  NonConvergenceError,
  ValuationStageError,
  type ValuationErrorCode,
} from "./errors.ts";
