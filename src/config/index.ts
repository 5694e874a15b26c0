/**
 * Valuation Configuration Loader
 *
 * Loads default assumptions and adapter settings from
 * valuation.config.yaml. Commands read assumptions from here instead of
 * hardcoding them.
 *
 * @example
 * ```typescript
 * import { getValuationConfig, getDefaultAssumptions } from './config/index.ts';
 *
 * const config = getValuationConfig();
 * console.log(config.provider.quarters); // 12
 * console.log(getDefaultAssumptions().growthRates); // [0.06, 0.055, ...]
 * ```
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import type { AssumptionSet } from '../types/index.ts';
import type { RetryPolicy } from '../utils/retry.ts';
import { validateValuationConfig, type ValuationConfig } from './schema.ts';

export {
  valuationConfigSchema,
  validateValuationConfig,
  type ValuationConfig,
} from './schema.ts';

export const CONFIG_FILE = 'valuation.config.yaml';

export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// CONFIG LOADING
// ============================================================================

let cachedConfig: ValuationConfig | null = null;
let configPath: string | null = null;

/**
 * Find valuation.config.yaml: the working directory first, then the
 * repository root relative to this module.
 */
function findConfigPath(): string {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const possiblePaths = [
    join(process.cwd(), CONFIG_FILE),
    join(moduleDir, '..', '..', CONFIG_FILE),
  ];

  for (const path of possiblePaths) {
    if (existsSync(path)) {
      return path;
    }
  }

  throw new ConfigError(
    `${CONFIG_FILE} not found. Searched:\n${possiblePaths.join('\n')}`
  );
}

/**
 * Load and validate the configuration
 *
 * @param forceReload - Re-read from disk instead of using the cached copy
 */
export function getValuationConfig(forceReload = false): ValuationConfig {
  if (cachedConfig && !forceReload) {
    return cachedConfig;
  }

  if (!configPath) {
    configPath = findConfigPath();
  }

  const parsed: unknown = parseYaml(readFileSync(configPath, 'utf-8'));

  const result = validateValuationConfig(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid ${configPath}:\n${issues}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/**
 * Clear the config cache (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  configPath = null;
}

/**
 * Set a custom config path (useful for testing)
 */
export function setConfigPath(path: string): void {
  configPath = path;
  cachedConfig = null;
}

// ============================================================================
// CONVENIENCE GETTERS
// ============================================================================

export function toAssumptionSet(
  assumptions: ValuationConfig['assumptions']
): AssumptionSet {
  return {
    taxRate: assumptions.tax_rate,
    riskFreeRate: assumptions.risk_free_rate,
    marketRiskPremium: assumptions.market_risk_premium,
    beta: assumptions.beta,
    costOfDebt: assumptions.cost_of_debt,
    perpetualGrowthRate: assumptions.perpetual_growth_rate,
    growthRates: [...assumptions.growth_rates],
    projectionYears: assumptions.projection_years,
  };
}

export function getDefaultAssumptions(): AssumptionSet {
  return toAssumptionSet(getValuationConfig().assumptions);
}

export function getRetryPolicy(): RetryPolicy {
  const { retry } = getValuationConfig().provider;
  return {
    maxAttempts: retry.max_attempts,
    baseDelayMs: retry.base_delay_ms,
    maxDelayMs: retry.max_delay_ms,
  };
}

export function getCacheTtlMs(): number {
  return getValuationConfig().cache.ttl_minutes * 60 * 1000;
}
