import { getDefaultAssumptions, getValuationConfig } from '../config/index.ts';
import { logger } from '../utils/logger.ts';
import { renderAssumptions } from './render.ts';

/**
 * Print the default assumption set and adapter settings from config
 */
export function runDefaults(options: { json: boolean }): void {
  const assumptions = getDefaultAssumptions();

  if (options.json) {
    console.log(JSON.stringify(assumptions, null, 2));
    return;
  }

  const { provider, cache, history } = getValuationConfig();

  logger.header('Default assumptions');
  console.log(renderAssumptions(assumptions));
  logger.info(
    `Provider: ${provider.quarters} quarters, ` +
      `${provider.retry.max_attempts} attempts on rate limits`
  );
  logger.info(`Cache TTL: ${cache.ttl_minutes} min · History table: ${history.table}`);
}
