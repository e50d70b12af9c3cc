/**
 * Numeric helpers for metric aggregation.
 *
 * Math.min(...arr) / Math.max(...arr) spread every element as a function
 * argument and hit V8's argument limit on large benchmark runs. These
 * iterative helpers work on arrays of any length.
 */

/**
 * Return the minimum value in a numeric array (iterative, no spread).
 * Returns `undefined` when the array is empty so callers can provide
 * their own fallback via `?? defaultValue`.
 */
export function safeMin(arr: readonly number[]): number | undefined {
  if (arr.length === 0) return undefined;
  let min = arr[0];
  for (let i = 1; i < arr.length; i++) {
    if (arr[i] < min) min = arr[i];
  }
  return min;
}

/**
 * Return the maximum value in a numeric array (iterative, no spread).
 */
export function safeMax(arr: readonly number[]): number | undefined {
  if (arr.length === 0) return undefined;
  let max = arr[0];
  for (let i = 1; i < arr.length; i++) {
    if (arr[i] > max) max = arr[i];
  }
  return max;
}

/**
 * Arithmetic mean, or `undefined` for an empty array.
 */
export function mean(arr: readonly number[]): number | undefined {
  if (arr.length === 0) return undefined;
  let sum = 0;
  for (const value of arr) sum += value;
  return sum / arr.length;
}

/**
 * Round half-up to a fixed number of decimal places.
 *
 * Operates on the binary value, so 1.005 rounds to 1 (1.005 * 100 is
 * 100.49999...). Only apply at the reporting boundary.
 */
export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
