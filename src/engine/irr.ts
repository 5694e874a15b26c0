import { InsufficientDataError, NonConvergenceError } from "./errors.ts";

export const IRR_SEARCH = {
  lowerBound: -0.99,
  upperBound: 10,
  newtonGuess: 0.1,
  newtonIterations: 50,
  bisectionIterations: 200,
  tolerance: 1e-10,
} as const;

/** NPV of a series whose first element falls at year 0 */
export function netPresentValue(rate: number, cashFlows: number[]): number {
  return cashFlows.reduce(
    (acc, cf, year) => acc + cf / Math.pow(1 + rate, year),
    0
  );
}

function npvDerivative(rate: number, cashFlows: number[]): number {
  return cashFlows.reduce(
    (acc, cf, year) =>
      year === 0 ? acc : acc - (year * cf) / Math.pow(1 + rate, year + 1),
    0
  );
}

function newton(cashFlows: number[]): number | null {
  let rate: number = IRR_SEARCH.newtonGuess;

  for (let i = 0; i < IRR_SEARCH.newtonIterations; i++) {
    const f = netPresentValue(rate, cashFlows);
    const df = npvDerivative(rate, cashFlows);
    if (!Number.isFinite(f) || !Number.isFinite(df) || Math.abs(df) < 1e-14) {
      return null;
    }

    const next = rate - f / df;
    if (
      !Number.isFinite(next) ||
      next <= IRR_SEARCH.lowerBound ||
      next > IRR_SEARCH.upperBound
    ) {
      return null;
    }
    if (Math.abs(next - rate) < IRR_SEARCH.tolerance) {
      return next;
    }
    rate = next;
  }

  return null;
}

function bisection(cashFlows: number[]): number {
  let lo: number = IRR_SEARCH.lowerBound;
  let hi: number = IRR_SEARCH.upperBound;
  let fLo = netPresentValue(lo, cashFlows);
  const fHi = netPresentValue(hi, cashFlows);

  if (!Number.isFinite(fLo) || !Number.isFinite(fHi) || fLo * fHi > 0) {
    throw new NonConvergenceError(
      `NPV does not change sign between ${lo} and ${hi}`,
      0
    );
  }

  for (let i = 1; i <= IRR_SEARCH.bisectionIterations; i++) {
    const mid = (lo + hi) / 2;
    const fMid = netPresentValue(mid, cashFlows);

    if (Math.abs(fMid) < IRR_SEARCH.tolerance || hi - lo < IRR_SEARCH.tolerance) {
      return mid;
    }
    if (fLo * fMid < 0) {
      hi = mid;
    } else {
      lo = mid;
      fLo = fMid;
    }
  }

  throw new NonConvergenceError(
    `IRR search did not converge in ${IRR_SEARCH.bisectionIterations} iterations`,
    IRR_SEARCH.bisectionIterations
  );
}

/**
 * Internal rate of return of a yearly series; `cashFlows[0]` is the
 * year-0 outlay (negative). Newton's method first, bisection over
 * [-99%, +1000%] when Newton stalls or leaves the interval.
 */
export function computeInternalRateOfReturn(cashFlows: number[]): number {
  if (cashFlows.length < 2) {
    throw new InsufficientDataError(
      "IRR needs an outlay and at least one future cash flow"
    );
  }

  return newton(cashFlows) ?? bisection(cashFlows);
}
