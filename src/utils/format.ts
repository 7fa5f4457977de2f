/**
 * Display formatting for rates, deltas and costs.
 */

/** 0.123 -> "12.3%" */
export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/** 0.12345 -> "$0.1235" */
export function formatCurrency(value: number): string {
  return `$${value.toFixed(4)}`;
}

/** Always-signed fixed decimals: 0.02 -> "+0.020", -0.5 -> "-0.500" */
export function formatSigned(value: number, decimals = 3): string {
  const fixed = value.toFixed(decimals);
  return value >= 0 ? `+${fixed}` : fixed;
}

/** Ratio that may be unbounded: Infinity -> "inf" */
export function formatRatio(value: number, decimals = 3): string {
  if (value === Number.POSITIVE_INFINITY) return 'inf';
  return value.toFixed(decimals);
}
