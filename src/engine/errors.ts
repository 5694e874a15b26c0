import type { ValuationStage } from "../types/index.ts";

export type ValuationErrorCode =
  | "INSUFFICIENT_DATA"
  | "DOMAIN_ERROR"
  | "NON_CONVERGENCE"
  | "STAGE_FAILED";

/**
 * Base class for every failure the valuation engine reports.
 * The engine never logs or recovers; callers switch on `code`.
 */
export abstract class ValuationError extends Error {
  abstract readonly code: ValuationErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required divisor or input series is zero, missing or empty. */
export class InsufficientDataError extends ValuationError {
  readonly code = "INSUFFICIENT_DATA";
}

/** Inputs are present but economically invalid (e.g. wacc <= terminal growth). */
export class DomainError extends ValuationError {
  readonly code = "DOMAIN_ERROR";
}

export class NonConvergenceError extends ValuationError {
  readonly code = "NON_CONVERGENCE";

  constructor(
    message: string,
    readonly iterations: number
  ) {
    super(message);
  }
}

/** Raised by runValuation, naming the pipeline stage that failed. */
export class ValuationStageError extends ValuationError {
  readonly code = "STAGE_FAILED";

  constructor(
    readonly stage: ValuationStage,
    readonly cause: ValuationError
  ) {
    super(`${stage}: ${cause.message}`, { cause });
  }
}
