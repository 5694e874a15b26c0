/**
 * Display formatting for the CLI. Amounts arrive in millions.
 */

export function formatMillions(value: number, decimals = 1): string {
  const abs = Math.abs(value);
  const sign = value < 0 ? '-' : '';
  if (abs >= 1_000_000) {
    return `${sign}$${(abs / 1_000_000).toFixed(decimals)}T`;
  }
  if (abs >= 1_000) {
    return `${sign}$${(abs / 1_000).toFixed(decimals)}B`;
  }
  return `${sign}$${abs.toFixed(decimals)}M`;
}

export function formatPrice(value: number): string {
  const sign = value < 0 ? '-' : '';
  return `${sign}$${Math.abs(value).toFixed(2)}`;
}

/** Value already in percent points, e.g. 12.5 -> "+12.5%" */
export function formatPct(value: number, decimals = 1): string {
  const sign = value > 0 ? '+' : '';
  return `${sign}${value.toFixed(decimals)}%`;
}

/** Decimal rate, e.g. 0.0825 -> "8.25%" */
export function formatRate(value: number, decimals = 2): string {
  return `${(value * 100).toFixed(decimals)}%`;
}

export function formatMultiple(value: number | null): string {
  return value === null ? 'n/a' : `${value.toFixed(1)}x`;
}
