/**
 * Tests for config loading and validation
 */
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { afterEach, describe, test, expect } from 'vitest';
import { parse as parseYaml } from 'yaml';
import {
  clearConfigCache,
  ConfigError,
  getCacheTtlMs,
  getDefaultAssumptions,
  getRetryPolicy,
  getValuationConfig,
  setConfigPath,
  validateValuationConfig,
  type ValuationConfig,
} from '../src/config/index.ts';

const fixture = (name: string) =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const repoConfig = (): unknown =>
  parseYaml(
    readFileSync(fileURLToPath(new URL('../valuation.config.yaml', import.meta.url)), 'utf-8')
  );

afterEach(() => {
  clearConfigCache();
});

describe('valuation.config.yaml', () => {
  test('shipped config is valid', () => {
    const result = validateValuationConfig(repoConfig());
    expect(result.success).toBe(true);
  });

  test('shipped defaults', () => {
    setConfigPath(fileURLToPath(new URL('../valuation.config.yaml', import.meta.url)));

    expect(getDefaultAssumptions()).toEqual({
      taxRate: 0.21,
      riskFreeRate: 0.045,
      marketRiskPremium: 0.08,
      beta: 1.15,
      costOfDebt: 0.05,
      perpetualGrowthRate: 0.025,
      growthRates: [0.06, 0.055, 0.05, 0.045, 0.04],
      projectionYears: 5,
    });
  });
});

describe('getValuationConfig', () => {
  test('loads a custom path', () => {
    setConfigPath(fixture('valuation.config.yaml'));

    const config = getValuationConfig();
    expect(config.provider.quarters).toBe(8);
    expect(config.history.table).toBe('test_runs');
    expect(getDefaultAssumptions().beta).toBeNull();
    expect(getRetryPolicy()).toEqual({
      maxAttempts: 2,
      baseDelayMs: 100,
      maxDelayMs: 400,
    });
    expect(getCacheTtlMs()).toBe(1_800_000);
  });

  test('caches until forced to reload', () => {
    setConfigPath(fixture('valuation.config.yaml'));
    expect(getValuationConfig(true)).toBe(getValuationConfig());
  });

  test('invalid config names the failing path', () => {
    setConfigPath(fixture('invalid.config.yaml'));

    expect(() => getValuationConfig()).toThrow(ConfigError);
    expect(() => getValuationConfig()).toThrow(
      'assumptions.growth_rates: growth_rates must have one entry per projection year'
    );
  });
});

describe('validateValuationConfig', () => {
  function validConfig(): ValuationConfig {
    const result = validateValuationConfig(repoConfig());
    if (!result.success) throw result.error;
    return structuredClone(result.data);
  }

  test('rejects a base delay above the max delay', () => {
    const config = validConfig();
    config.provider.retry.base_delay_ms = 5000;
    expect(validateValuationConfig(config).success).toBe(false);
  });

  test('rejects more than 12 quarters', () => {
    const config = validConfig();
    config.provider.quarters = 20;
    expect(validateValuationConfig(config).success).toBe(false);
  });

  test('rejects a tax rate above 100%', () => {
    const config = validConfig();
    config.assumptions.tax_rate = 1.5;
    expect(validateValuationConfig(config).success).toBe(false);
  });
});
