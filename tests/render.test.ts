import { describe, test, expect } from 'vitest';
import {
  renderAssumptions,
  renderProjection,
  renderQuality,
  renderSensitivity,
  renderSummary,
  renderWacc,
} from '../src/commands/render.ts';
import { computeSensitivityGrid, runValuation } from '../src/engine/index.ts';
import { createAssumptions, createQuarters, createSnapshot } from './helpers.ts';

const report = runValuation(createSnapshot(), createQuarters(), createAssumptions());

describe('render', () => {
  test('summary shows the headline figures', () => {
    const output = renderSummary(report);

    expect(output).toContain('Acme Corp (ACME)');
    expect(output).toContain('$60.48');
    expect(output).toContain('+21.0%');
    expect(output).toContain('STRONG BUY');
    expect(output).toContain('11.0x');
    expect(output).toContain('78.4%');
  });

  test('projection lists every year and the terminal row', () => {
    const output = renderProjection(report);

    expect(output).toContain('$55.0M');
    expect(output).toContain('$721.3M');
    expect(output).toContain('Terminal');
  });

  test('WACC breakdown', () => {
    expect(renderWacc(report)).toContain('11.99%');
  });

  test('quality lines list issues', () => {
    const lines = renderQuality({
      grade: 'POOR',
      issues: ['No quarterly cash flow data'],
      warnings: [],
      usable: false,
    });

    expect(lines).toHaveLength(2);
    expect(lines[1]).toContain('No quarterly cash flow data');
  });

  test('sensitivity marks impossible cells', () => {
    const grid = computeSensitivityGrid(
      createSnapshot(),
      createQuarters(),
      createAssumptions(),
      [0],
      [0, 0.1]
    );
    expect(renderSensitivity(grid)).toContain('n/a');
  });

  test('assumptions show provider beta when unset', () => {
    expect(renderAssumptions(createAssumptions())).toContain('from provider');
  });
});
