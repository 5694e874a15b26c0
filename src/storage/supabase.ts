import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { DataQualityReport, ValuationReport } from '../types/index.ts';
import { logger } from '../utils/logger.ts';

/**
 * Row shape of the valuation run history table
 */
export const ValuationRunRecord = z.object({
  id: z.number().optional(),
  ticker: z.string(),
  created_at: z.string(),
  assumptions_json: z.string(),
  results_json: z.string(),
  intrinsic_value_per_share: z.number().nullable(),
  current_price: z.number().nullable(),
  upside_pct: z.number().nullable(),
  recommendation: z.string(),
  data_quality: z.string().nullable(),
});
export type ValuationRunRecord = z.infer<typeof ValuationRunRecord>;

interface StorageError {
  message: string;
}

/**
 * The two table operations the store needs, so tests can substitute an
 * in-memory table for Supabase.
 */
export interface RunTable {
  insert(record: ValuationRunRecord): Promise<{ error: StorageError | null }>;
  select(query: {
    ticker?: string;
    limit: number;
  }): Promise<{ data: unknown[] | null; error: StorageError | null }>;
}

/**
 * Get Supabase URL from env (supports multiple variable names)
 */
function getSupabaseUrl(): string | undefined {
  return process.env.SUPABASE_URL ?? process.env.NEXT_PUBLIC_SUPABASE_URL;
}

/**
 * Get Supabase service key from env
 */
function getSupabaseKey(): string | undefined {
  return process.env.SUPABASE_SERVICE_KEY ?? process.env.SUPABASE_ANON_KEY;
}

/**
 * Check if Supabase is configured
 */
export function isConfigured(): boolean {
  return !!(getSupabaseUrl() && getSupabaseKey());
}

let supabaseClient: SupabaseClient | null = null;

function getClient(): SupabaseClient {
  if (supabaseClient) return supabaseClient;

  const url = getSupabaseUrl();
  const key = getSupabaseKey();

  if (!url || !key) {
    throw new Error(
      'Missing Supabase credentials. Set SUPABASE_URL and ' +
        'SUPABASE_SERVICE_KEY (or SUPABASE_ANON_KEY)'
    );
  }

  supabaseClient = createClient(url, key);
  return supabaseClient;
}

export function supabaseRunTable(
  client: SupabaseClient,
  table: string
): RunTable {
  return {
    async insert(record) {
      const { error } = await client.from(table).insert(record);
      return { error };
    },
    async select({ ticker, limit }) {
      let query = client.from(table).select('*');
      if (ticker) {
        query = query.eq('ticker', ticker);
      }
      const { data, error } = await query
        .order('created_at', { ascending: false })
        .limit(limit);
      return { data, error };
    },
  };
}

/**
 * Convert a report to its history row. The full report and the assumptions
 * are stored as JSON alongside the headline figures.
 */
export function toRunRecord(
  report: ValuationReport,
  quality?: DataQualityReport,
  createdAt: Date = new Date()
): ValuationRunRecord {
  return {
    ticker: report.ticker,
    created_at: createdAt.toISOString(),
    assumptions_json: JSON.stringify(report.assumptions),
    results_json: JSON.stringify(report),
    intrinsic_value_per_share: Number.isFinite(report.intrinsicValuePerShare)
      ? report.intrinsicValuePerShare
      : null,
    current_price: report.currentMarketValue,
    upside_pct: Number.isFinite(report.upsidePct) ? report.upsidePct : null,
    recommendation: report.recommendation,
    data_quality: quality?.grade ?? null,
  };
}

/**
 * Valuation run history. Failures are logged and reported as
 * false / empty so a storage outage never hides a finished valuation.
 */
export class ValuationRunStore {
  constructor(private readonly table: RunTable) {}

  async saveRun(
    report: ValuationReport,
    quality?: DataQualityReport
  ): Promise<boolean> {
    try {
      const { error } = await this.table.insert(toRunRecord(report, quality));

      if (error) {
        logger.error(`Failed to save run for ${report.ticker}: ${error.message}`);
        return false;
      }
      return true;
    } catch (error) {
      logger.error(`Database error for ${report.ticker}: ${error}`);
      return false;
    }
  }

  async listRuns(ticker?: string, limit = 20): Promise<ValuationRunRecord[]> {
    try {
      const { data, error } = await this.table.select({
        ticker: ticker?.toUpperCase(),
        limit,
      });

      if (error) {
        logger.error(`Failed to fetch run history: ${error.message}`);
        return [];
      }

      const rows = z.array(ValuationRunRecord).safeParse(data ?? []);
      if (!rows.success) {
        logger.error('Run history rows have an unexpected shape');
        return [];
      }
      return rows.data;
    } catch (error) {
      logger.error(`Database error: ${error}`);
      return [];
    }
  }
}

/**
 * Store backed by the Supabase project named in the environment
 */
export function createRunStore(table: string): ValuationRunStore {
  return new ValuationRunStore(supabaseRunTable(getClient(), table));
}
