/**
 * Calculate arithmetic mean of an array of numbers.
 */
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  const sum = values.reduce((a, b) => a + b, 0);
  return sum / values.length;
}

/**
 * Trailing rolling mean. Each output is the mean of the value and up to
 * `window - 1` values before it, so the first entries use whatever history
 * exists (minimum window of 1).
 */
export function rollingMean(values: number[], window: number): number[] {
  if (!Number.isInteger(window) || window < 1) {
    throw new Error(`Rolling window must be a positive integer, got ${window}`);
  }
  return values.map((_, i) => mean(values.slice(Math.max(0, i - window + 1), i + 1)));
}

/**
 * Percentage of `part` in `whole`; 0 when `whole` is 0.
 */
export function percentage(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

/**
 * Round to specified decimal places.
 */
export function round(value: number, decimals: number = 4): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
