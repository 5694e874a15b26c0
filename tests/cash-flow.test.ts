/**
 * Tests for TTM free cash flow, projection and discounting
 */
import { describe, test, expect } from 'vitest';
import {
  computeTTMFreeCashFlow,
  discountSeries,
  DomainError,
  projectFreeCashFlows,
} from '../src/engine/index.ts';
import { createQuarters } from './helpers.ts';

describe('computeTTMFreeCashFlow', () => {
  test('sums the last four quarters of OCF plus capex', () => {
    const history = [
      { label: 'Q1', operatingCashFlow: 100, capitalExpenditure: -40, netIncome: 1 },
      ...createQuarters(4),
    ];

    const ttm = computeTTMFreeCashFlow(history);

    expect(ttm.ttmFcf).toBe(50);
    expect(ttm.ttmOperatingCashFlow).toBe(60);
    expect(ttm.ttmCapitalExpenditure).toBe(-10);
    expect(ttm.ttmNetIncome).toBe(40);
    expect(ttm.quartersUsed).toBe(4);
    expect(ttm.quarterlyFcf).toEqual([60, 12.5, 12.5, 12.5, 12.5]);
  });

  test('four quarters of 100 OCF and -20 capex give 320', () => {
    const ttm = computeTTMFreeCashFlow(
      createQuarters(4, { operatingCashFlow: 100, capitalExpenditure: -20 })
    );
    expect(ttm.ttmFcf).toBe(320);
  });

  test('uses every quarter when fewer than four exist', () => {
    const ttm = computeTTMFreeCashFlow(createQuarters(2));

    expect(ttm.ttmFcf).toBe(25);
    expect(ttm.quartersUsed).toBe(2);
  });

  test('empty history yields zeros', () => {
    const ttm = computeTTMFreeCashFlow([]);

    expect(ttm.ttmFcf).toBe(0);
    expect(ttm.quartersUsed).toBe(0);
    expect(ttm.quarterlyFcf).toEqual([]);
  });

  test('keeps a negative TTM as-is', () => {
    const ttm = computeTTMFreeCashFlow(
      createQuarters(4, { operatingCashFlow: 5, capitalExpenditure: -10 })
    );
    expect(ttm.ttmFcf).toBe(-20);
  });
});

describe('projectFreeCashFlows', () => {
  test('compounds year over year', () => {
    const projected = projectFreeCashFlows(100, [0.1, 0.1]);

    expect(projected).toHaveLength(2);
    expect(projected[0]).toBeCloseTo(110, 10);
    expect(projected[1]).toBeCloseTo(121, 10);
  });

  test('five years at 10% compound to 161.05', () => {
    const projected = projectFreeCashFlows(100, [0.1, 0.1, 0.1, 0.1, 0.1]);

    expect(projected).toHaveLength(5);
    expect(projected[4]).toBeCloseTo(161.051, 9);
  });

  test('takes zero and negative growth as given', () => {
    expect(projectFreeCashFlows(100, [0, -0.5])).toEqual([100, 50]);
  });

  test('no growth rates means no projection', () => {
    expect(projectFreeCashFlows(100, [])).toEqual([]);
  });
});

describe('discountSeries', () => {
  test('discounts year i by (1 + r)^i', () => {
    const { presentValues, total } = discountSeries([110, 121], 0.1);

    expect(presentValues[0]).toBeCloseTo(100, 10);
    expect(presentValues[1]).toBeCloseTo(100, 10);
    expect(total).toBeCloseTo(200, 10);
  });

  test('zero rate leaves values unchanged', () => {
    expect(discountSeries([1, 2, 3], 0)).toEqual({
      presentValues: [1, 2, 3],
      total: 6,
    });
  });

  test('rejects a rate at or below -100%', () => {
    expect(() => discountSeries([1], -1)).toThrow(DomainError);
  });
});
