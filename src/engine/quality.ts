import type {
  CompanySnapshot,
  DataQualityGrade,
  DataQualityReport,
  HistoricalQuarter,
} from "../types/index.ts";
import { TTM_QUARTERS } from "./cash-flow.ts";

/**
 * Critical problems make a snapshot unusable for a DCF; warnings flag
 * numbers that are likely wrong but do not stop the math.
 */
export function checkSnapshot(snapshot: CompanySnapshot): {
  issues: string[];
  warnings: string[];
} {
  const issues: string[] = [];
  const warnings: string[] = [];

  if (snapshot.sharesOutstanding <= 0) {
    issues.push("Missing shares outstanding - cannot calculate per-share value");
  }
  if (snapshot.currentPrice <= 0) {
    issues.push("Missing current stock price - cannot determine market value");
  }

  if (snapshot.totalDebt === 0 && snapshot.cash === 0) {
    warnings.push("Both debt and cash are zero - check balance sheet data");
  }
  if (snapshot.cash < 0) {
    warnings.push("Negative cash balance detected");
  }
  if (snapshot.totalDebt < 0) {
    warnings.push("Negative debt detected");
  }

  return { issues, warnings };
}

export function checkHistory(history: HistoricalQuarter[]): {
  issues: string[];
  warnings: string[];
} {
  const issues: string[] = [];
  const warnings: string[] = [];

  if (history.length === 0) {
    issues.push("No quarterly cash flow data");
    return { issues, warnings };
  }

  if (history.length < TTM_QUARTERS) {
    issues.push(
      `Only ${history.length} quarters of data (need at least ${TTM_QUARTERS} for TTM)`
    );
  }
  if (history.every((q) => q.operatingCashFlow === 0)) {
    issues.push("All operating cash flow values are zero");
  }
  if (history.every((q) => q.capitalExpenditure === 0)) {
    warnings.push("All CapEx values are zero - unusual for most companies");
  }

  return { issues, warnings };
}

function gradeFor(issues: number, warnings: number): DataQualityGrade {
  if (issues > 0) return "POOR";
  if (warnings > 2) return "FAIR";
  if (warnings > 0) return "GOOD";
  return "EXCELLENT";
}

export function assessDataQuality(
  snapshot: CompanySnapshot,
  history: HistoricalQuarter[]
): DataQualityReport {
  const company = checkSnapshot(snapshot);
  const quarters = checkHistory(history);

  const issues = [...company.issues, ...quarters.issues];
  const warnings = [...company.warnings, ...quarters.warnings];

  return {
    grade: gradeFor(issues.length, warnings.length),
    issues,
    warnings,
    usable: issues.length === 0,
  };
}
