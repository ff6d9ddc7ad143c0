/**
 * Math Helper Utilities
 *
 * Operations that guard against division by zero and NaN propagation.
 */

/**
 * Calculate safe average of an array of numbers
 *
 * @param values - Array of numbers to average
 * @param defaultValue - Value to return if array is empty (default: 0)
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])        // => 2
 * safeAverage([])               // => 0
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return safeSum(values) / values.length;
}

/**
 * Calculate safe division that guards against division by zero
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Sum an array of numbers (0 when empty)
 */
export function safeSum(values: readonly number[]): number {
  return values.reduce((acc, val) => acc + val, 0);
}
