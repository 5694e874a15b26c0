import type { TerminalValueResult } from "../types/index.ts";
import { DomainError } from "./errors.ts";

/**
 * Gordon growth terminal value and its present value at the end of the
 * explicit horizon.
 *
 * Requires wacc > perpetualGrowth strictly; anything else would produce
 * an infinite or negative perpetuity and is rejected.
 */
export function computeTerminalValue(
  finalYearFcf: number,
  perpetualGrowth: number,
  wacc: number,
  horizon: number
): TerminalValueResult {
  if (wacc <= perpetualGrowth) {
    throw new DomainError(
      `terminal growth exceeds discount rate ` +
        `(growth ${perpetualGrowth}, wacc ${wacc})`
    );
  }

  const terminalValue =
    (finalYearFcf * (1 + perpetualGrowth)) / (wacc - perpetualGrowth);

  return {
    terminalValue,
    presentValue: terminalValue / Math.pow(1 + wacc, horizon),
  };
}
