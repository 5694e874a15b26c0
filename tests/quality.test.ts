/**
 * Tests for the pre-valuation data quality check
 */
import { describe, test, expect } from 'vitest';
import {
  assessDataQuality,
  checkHistory,
  checkSnapshot,
} from '../src/engine/quality.ts';
import { createQuarters, createSnapshot } from './helpers.ts';

describe('checkSnapshot', () => {
  test('clean snapshot has nothing to report', () => {
    expect(checkSnapshot(createSnapshot())).toEqual({ issues: [], warnings: [] });
  });

  test('missing shares and price are issues', () => {
    const { issues } = checkSnapshot(
      createSnapshot({ sharesOutstanding: 0, currentPrice: 0 })
    );
    expect(issues).toEqual([
      'Missing shares outstanding - cannot calculate per-share value',
      'Missing current stock price - cannot determine market value',
    ]);
  });

  test('balance sheet oddities are warnings', () => {
    expect(
      checkSnapshot(createSnapshot({ totalDebt: 0, cash: 0 })).warnings
    ).toEqual(['Both debt and cash are zero - check balance sheet data']);
    expect(
      checkSnapshot(createSnapshot({ totalDebt: -5, cash: -1 })).warnings
    ).toEqual(['Negative cash balance detected', 'Negative debt detected']);
  });
});

describe('checkHistory', () => {
  test('empty history stops at one issue', () => {
    expect(checkHistory([])).toEqual({
      issues: ['No quarterly cash flow data'],
      warnings: [],
    });
  });

  test('short history is an issue', () => {
    expect(checkHistory(createQuarters(3)).issues).toEqual([
      'Only 3 quarters of data (need at least 4 for TTM)',
    ]);
  });

  test('all-zero OCF is an issue, all-zero capex a warning', () => {
    const result = checkHistory(
      createQuarters(4, { operatingCashFlow: 0, capitalExpenditure: 0 })
    );
    expect(result.issues).toEqual(['All operating cash flow values are zero']);
    expect(result.warnings).toEqual([
      'All CapEx values are zero - unusual for most companies',
    ]);
  });
});

describe('assessDataQuality', () => {
  test('no findings grades EXCELLENT', () => {
    const report = assessDataQuality(createSnapshot(), createQuarters());
    expect(report).toEqual({
      grade: 'EXCELLENT',
      issues: [],
      warnings: [],
      usable: true,
    });
  });

  test('one or two warnings grade GOOD', () => {
    const report = assessDataQuality(
      createSnapshot({ totalDebt: 0, cash: 0 }),
      createQuarters()
    );
    expect(report.grade).toBe('GOOD');
    expect(report.usable).toBe(true);
  });

  test('more than two warnings grade FAIR', () => {
    const report = assessDataQuality(
      createSnapshot({ totalDebt: -5, cash: -1 }),
      createQuarters(4, { capitalExpenditure: 0 })
    );
    expect(report.warnings).toHaveLength(3);
    expect(report.grade).toBe('FAIR');
  });

  test('any issue grades POOR and unusable', () => {
    const report = assessDataQuality(createSnapshot(), []);
    expect(report.grade).toBe('POOR');
    expect(report.usable).toBe(false);
  });
});
