/**
 * Tests for equity reconciliation and recommendation tiers
 */
import { describe, test, expect } from 'vitest';
import {
  classifyRecommendation,
  computeUpsidePct,
  InsufficientDataError,
  perShareIntrinsicValue,
  reconcileEquityValue,
} from '../src/engine/index.ts';

describe('reconcileEquityValue', () => {
  test('subtracts debt and adds cash', () => {
    expect(reconcileEquityValue(1000, 300, 50)).toBe(750);
  });

  test('returns a negative equity value as-is', () => {
    expect(reconcileEquityValue(100, 300, 0)).toBe(-200);
  });
});

describe('perShareIntrinsicValue', () => {
  test('divides equity by shares', () => {
    expect(perShareIntrinsicValue(750, 10)).toBe(75);
  });

  test('zero shares is insufficient data', () => {
    expect(() => perShareIntrinsicValue(750, 0)).toThrow(InsufficientDataError);
  });
});

describe('computeUpsidePct', () => {
  test('percent over market price', () => {
    expect(computeUpsidePct(75, 50)).toBe(50);
    expect(computeUpsidePct(40, 50)).toBe(-20);
  });

  test('non-positive price is insufficient data', () => {
    expect(() => computeUpsidePct(75, 0)).toThrow(InsufficientDataError);
  });
});

describe('classifyRecommendation', () => {
  test.each([
    [35, 'STRONG BUY'],
    [20, 'STRONG BUY'],
    [19.999, 'BUY'],
    [19.99, 'BUY'],
    [10, 'BUY'],
    [0, 'HOLD'],
    [-10, 'HOLD'],
    [-10.001, 'SELL'],
    [-10.01, 'SELL'],
    [-80, 'SELL'],
  ] as const)('%s%% upside is %s', (upside, expected) => {
    expect(classifyRecommendation(upside)).toBe(expected);
  });
});
