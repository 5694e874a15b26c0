/**
 * Terminal rendering for valuation results. Read-only over the report:
 * nothing here feeds back into the numbers.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type {
  AssumptionSet,
  DataQualityReport,
  Recommendation,
  SensitivityGrid,
  ValuationReport,
} from '../types/index.ts';
import {
  formatMillions,
  formatMultiple,
  formatPct,
  formatPrice,
  formatRate,
} from '../utils/format.ts';

const TABLE_STYLE: { head: string[]; border: string[] } = {
  head: [],
  border: ['gray'],
};

export function colorRecommendation(recommendation: Recommendation): string {
  switch (recommendation) {
    case 'STRONG BUY':
      return chalk.bold.green(recommendation);
    case 'BUY':
      return chalk.green(recommendation);
    case 'HOLD':
      return chalk.yellow(recommendation);
    case 'SELL':
      return chalk.red(recommendation);
  }
}

function colorUpside(upsidePct: number): string {
  const text = formatPct(upsidePct);
  if (upsidePct >= 10) return chalk.green(text);
  if (upsidePct >= -10) return chalk.yellow(text);
  return chalk.red(text);
}

export function renderSummary(report: ValuationReport): string {
  const table = new Table({ style: TABLE_STYLE });
  const { snapshot } = report;

  table.push(
    [chalk.gray('Company'), `${snapshot.companyName} (${report.ticker})`],
    [chalk.gray('TTM free cash flow'), formatMillions(report.ttm.ttmFcf)],
    [chalk.gray('Enterprise value (DCF)'), formatMillions(report.enterpriseValue)],
    [chalk.gray('Equity value'), formatMillions(report.equityValue)],
    [chalk.gray('Intrinsic value / share'), chalk.bold(formatPrice(report.intrinsicValuePerShare))],
    [chalk.gray('Current price'), formatPrice(report.currentMarketValue)],
    [chalk.gray('Upside'), colorUpside(report.upsidePct)],
    [chalk.gray('Recommendation'), colorRecommendation(report.recommendation)],
    [chalk.gray('Implied IRR'), report.irr === null ? 'n/a' : formatRate(report.irr)],
    [chalk.gray('EV / FCF'), formatMultiple(report.evFcfMultiple)],
    [chalk.gray('Terminal value share of EV'), `${report.terminalValueShare.toFixed(1)}%`]
  );

  return table.toString();
}

export function renderProjection(report: ValuationReport): string {
  const table = new Table({
    head: ['Year', 'Growth', 'Projected FCF', 'Present value'].map((h) =>
      chalk.magenta(h)
    ),
    style: TABLE_STYLE,
  });

  report.projectedFcf.forEach((fcf, i) => {
    table.push([
      String(i + 1),
      formatRate(report.assumptions.growthRates[i] ?? 0, 1),
      formatMillions(fcf),
      formatMillions(report.presentValues[i] ?? 0),
    ]);
  });
  table.push([
    'Terminal',
    formatRate(report.assumptions.perpetualGrowthRate, 1),
    formatMillions(report.terminalValue),
    formatMillions(report.pvTerminalValue),
  ]);

  return table.toString();
}

export function renderWacc(report: ValuationReport): string {
  const { wacc, assumptions } = report;
  const table = new Table({ style: TABLE_STYLE });

  table.push(
    [chalk.gray('Risk-free rate'), formatRate(assumptions.riskFreeRate)],
    [chalk.gray('Beta'), wacc.beta.toFixed(2)],
    [chalk.gray('Market risk premium'), formatRate(assumptions.marketRiskPremium)],
    [chalk.gray('Cost of equity'), formatRate(wacc.costOfEquity)],
    [chalk.gray('After-tax cost of debt'), formatRate(wacc.afterTaxCostOfDebt)],
    [chalk.gray('Equity weight'), formatRate(wacc.equityWeight, 1)],
    [chalk.gray('Debt weight'), formatRate(wacc.debtWeight, 1)],
    [chalk.gray('WACC'), chalk.bold(formatRate(wacc.wacc))]
  );

  return table.toString();
}

export function renderQuality(quality: DataQualityReport): string[] {
  const color =
    quality.grade === 'POOR'
      ? chalk.red
      : quality.grade === 'FAIR'
        ? chalk.yellow
        : chalk.green;

  return [
    `Data quality: ${color(quality.grade)}`,
    ...quality.issues.map((issue) => chalk.red(`  ✗ ${issue}`)),
    ...quality.warnings.map((warning) => chalk.yellow(`  ⚠ ${warning}`)),
  ];
}

export function renderSensitivity(grid: SensitivityGrid): string {
  const firstRow = grid.rows[0] ?? [];
  const table = new Table({
    head: [
      chalk.magenta('WACC \\ g'),
      ...firstRow.map((cell) => chalk.magenta(formatRate(cell.perpetualGrowthRate, 1))),
    ],
    style: TABLE_STYLE,
  });

  for (const row of grid.rows) {
    const rate = row[0]?.discountRate ?? 0;
    table.push([
      formatRate(rate, 1),
      ...row.map((cell) =>
        cell.intrinsicValuePerShare === null
          ? chalk.gray('n/a')
          : formatPrice(cell.intrinsicValuePerShare)
      ),
    ]);
  }

  return table.toString();
}

export function renderAssumptions(assumptions: AssumptionSet): string {
  const table = new Table({ style: TABLE_STYLE });

  table.push(
    [chalk.gray('Tax rate'), formatRate(assumptions.taxRate)],
    [chalk.gray('Risk-free rate'), formatRate(assumptions.riskFreeRate)],
    [chalk.gray('Market risk premium'), formatRate(assumptions.marketRiskPremium)],
    [
      chalk.gray('Beta'),
      assumptions.beta === null || assumptions.beta === undefined
        ? 'from provider'
        : assumptions.beta.toFixed(2),
    ],
    [chalk.gray('Cost of debt'), formatRate(assumptions.costOfDebt)],
    [chalk.gray('Perpetual growth'), formatRate(assumptions.perpetualGrowthRate)],
    [
      chalk.gray('Growth rates'),
      assumptions.growthRates.map((g) => formatRate(g, 1)).join(', '),
    ]
  );

  return table.toString();
}
