import { InvalidArgumentError } from 'commander';

/**
 * Commander parser for counts such as --concurrency and --limit.
 * Commander passes the previous value as a second argument, so this never
 * forwards it to parseInt as a radix.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`expected a positive integer, got "${value}"`);
  }
  return parsed;
}
