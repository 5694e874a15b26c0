/**
 * Tests for valuation run history, against an in-memory table
 */
import { afterEach, describe, test, expect, vi } from 'vitest';
import { assessDataQuality, runValuation } from '../src/engine/index.ts';
import {
  isConfigured,
  toRunRecord,
  ValuationRunStore,
  type RunTable,
  type ValuationRunRecord,
} from '../src/storage/supabase.ts';
import { createAssumptions, createQuarters, createSnapshot } from './helpers.ts';

function createMemoryTable(): RunTable & { rows: ValuationRunRecord[] } {
  const rows: ValuationRunRecord[] = [];
  return {
    rows,
    async insert(record) {
      rows.push({ ...record, id: rows.length + 1 });
      return { error: null };
    },
    async select({ ticker, limit }) {
      const data = rows
        .filter((row) => !ticker || row.ticker === ticker)
        .sort((a, b) => b.created_at.localeCompare(a.created_at))
        .slice(0, limit);
      return { data, error: null };
    },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

const report = runValuation(createSnapshot(), createQuarters(), createAssumptions());
const quality = assessDataQuality(createSnapshot(), createQuarters());

describe('toRunRecord', () => {
  test('flattens headline figures and stores JSON', () => {
    const record = toRunRecord(report, quality, new Date('2025-01-15T12:00:00Z'));

    expect(record.ticker).toBe('ACME');
    expect(record.created_at).toBe('2025-01-15T12:00:00.000Z');
    expect(record.current_price).toBe(50);
    expect(record.recommendation).toBe('STRONG BUY');
    expect(record.data_quality).toBe('EXCELLENT');
    expect(record.intrinsic_value_per_share).toBeCloseTo(60.47879602466018, 8);
    expect(JSON.parse(record.assumptions_json)).toEqual(report.assumptions);
    expect(JSON.parse(record.results_json).enterpriseValue).toBeCloseTo(
      654.7879602466018,
      8
    );
  });

  test('quality grade is optional', () => {
    expect(toRunRecord(report).data_quality).toBeNull();
  });
});

describe('ValuationRunStore', () => {
  test('saves and lists runs newest first', async () => {
    const table = createMemoryTable();
    const store = new ValuationRunStore(table);

    expect(await store.saveRun(report, quality)).toBe(true);
    table.rows.push({
      ...toRunRecord(report, quality, new Date('2030-01-01T00:00:00Z')),
      ticker: 'MSFT',
    });

    const all = await store.listRuns();
    expect(all.map((r) => r.ticker)).toEqual(['MSFT', 'ACME']);

    const acme = await store.listRuns('acme', 5);
    expect(acme).toHaveLength(1);
    expect(acme[0]?.id).toBe(1);
  });

  test('insert errors are reported as false', async () => {
    const table = createMemoryTable();
    table.insert = vi.fn(async () => ({ error: { message: 'permission denied' } }));
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await new ValuationRunStore(table).saveRun(report)).toBe(false);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  test('thrown errors are reported as false', async () => {
    const table = createMemoryTable();
    table.insert = vi.fn(async () => {
      throw new Error('network down');
    });
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await new ValuationRunStore(table).saveRun(report)).toBe(false);
  });

  test('malformed rows list as empty', async () => {
    const table = createMemoryTable();
    table.select = vi.fn(async () => ({ data: [{ ticker: 42 }], error: null }));
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await new ValuationRunStore(table).listRuns()).toEqual([]);
  });
});

describe('isConfigured', () => {
  test('needs both a URL and a key', () => {
    vi.stubEnv('SUPABASE_URL', '');
    vi.stubEnv('NEXT_PUBLIC_SUPABASE_URL', '');
    vi.stubEnv('SUPABASE_SERVICE_KEY', '');
    vi.stubEnv('SUPABASE_ANON_KEY', '');
    expect(isConfigured()).toBe(false);

    vi.stubEnv('SUPABASE_URL', 'http://localhost:54321');
    expect(isConfigured()).toBe(false);

    vi.stubEnv('SUPABASE_SERVICE_KEY', 'test-key');
    expect(isConfigured()).toBe(true);
  });
});
