import { describe, test, expect } from 'vitest';
import {
  computeSensitivityGrid,
  DEFAULT_GROWTH_SHIFTS,
  DEFAULT_WACC_SHIFTS,
  InsufficientDataError,
  runValuation,
} from '../src/engine/index.ts';
import { createAssumptions, createQuarters, createSnapshot } from './helpers.ts';

describe('computeSensitivityGrid', () => {
  test('centre cell matches the base valuation', () => {
    const grid = computeSensitivityGrid(
      createSnapshot(),
      createQuarters(),
      createAssumptions()
    );
    const base = runValuation(createSnapshot(), createQuarters(), createAssumptions());

    expect(grid.waccShifts).toEqual(DEFAULT_WACC_SHIFTS);
    expect(grid.growthShifts).toEqual(DEFAULT_GROWTH_SHIFTS);
    expect(grid.rows).toHaveLength(5);
    expect(grid.rows[2]?.[2]?.intrinsicValuePerShare).toBeCloseTo(
      base.intrinsicValuePerShare,
      10
    );
  });

  test('value falls as the discount rate rises', () => {
    const grid = computeSensitivityGrid(
      createSnapshot(),
      createQuarters(),
      createAssumptions()
    );
    const column = grid.rows.map((row) => row[2]?.intrinsicValuePerShare ?? NaN);

    for (let i = 1; i < column.length; i++) {
      expect(column[i]).toBeLessThan(column[i - 1] ?? -Infinity);
    }
  });

  test('cells where growth reaches the discount rate are null', () => {
    const grid = computeSensitivityGrid(
      createSnapshot(),
      createQuarters(),
      createAssumptions(),
      [0],
      [0, 0.1]
    );

    expect(grid.rows[0]?.[0]?.intrinsicValuePerShare).not.toBeNull();
    expect(grid.rows[0]?.[1]).toEqual({
      discountRate: 0.11991666666666667,
      perpetualGrowthRate: 0.13,
      intrinsicValuePerShare: null,
    });
  });

  test('needs cash flow history', () => {
    expect(() =>
      computeSensitivityGrid(createSnapshot(), [], createAssumptions())
    ).toThrow(InsufficientDataError);
  });
});
