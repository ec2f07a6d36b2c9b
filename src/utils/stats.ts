/**
 * Numeric helpers shared by the nightly analyzers
 */

/**
 * Calculate the mean of an array of numbers
 * Returns undefined for an empty array so callers never mistake "no readings" for 0
 */
export function mean(values: number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Round to a fixed number of decimal places
 * e.g., roundTo(35.528, 2) -> 35.53
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

/**
 * Round an optional value, keeping undefined as undefined
 */
export function roundOptional(value: number | undefined, decimals: number): number | undefined {
  return value === undefined ? undefined : roundTo(value, decimals);
}
