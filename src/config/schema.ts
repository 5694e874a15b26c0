/**
 * Valuation Configuration Zod Schema
 *
 * Runtime validation for valuation.config.yaml. Ranges are sanity bounds
 * for the inputs, not economic judgements: whether the discount rate
 * clears the perpetual growth rate is checked by the engine per company.
 */

import { z } from 'zod';

const rate = z.number().min(-1).max(1);

const assumptionsSchema = z
  .object({
    tax_rate: z.number().min(0).max(1),
    risk_free_rate: rate,
    market_risk_premium: rate,
    beta: z.number().min(-5).max(10).nullable(),
    cost_of_debt: z.number().min(0).max(1),
    perpetual_growth_rate: rate,
    projection_years: z.number().int().min(1).max(30),
    growth_rates: z.array(rate).min(1),
  })
  .refine((data) => data.growth_rates.length === data.projection_years, {
    message: 'growth_rates must have one entry per projection year',
    path: ['growth_rates'],
  });

const retrySchema = z
  .object({
    max_attempts: z.number().int().min(1).max(10),
    base_delay_ms: z.number().int().min(0),
    max_delay_ms: z.number().int().min(0),
  })
  .refine((data) => data.base_delay_ms <= data.max_delay_ms, {
    message: 'base_delay_ms must be <= max_delay_ms',
  });

/**
 * Complete Zod schema for valuation.config.yaml
 */
export const valuationConfigSchema = z.object({
  assumptions: assumptionsSchema,
  provider: z.object({
    quarters: z.number().int().min(1).max(12),
    retry: retrySchema,
  }),
  cache: z.object({
    ttl_minutes: z.number().min(0),
  }),
  history: z.object({
    table: z.string().min(1),
  }),
});

export type ValuationConfig = z.infer<typeof valuationConfigSchema>;

/**
 * Validate a parsed config object.
 *
 * Returns a Zod SafeParseResult; on failure `result.error.issues` lists
 * each problem with its path.
 */
export function validateValuationConfig(config: unknown) {
  return valuationConfigSchema.safeParse(config);
}
