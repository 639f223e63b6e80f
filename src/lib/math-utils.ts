/**
 * @fileoverview Math utilities for the risk engine.
 * Statistical calculations over return series and small numeric helpers.
 */

// ============================================================================
// STATISTICAL FUNCTIONS
// ============================================================================

/**
 * Calculates the mean (average) of an array of numbers.
 * Returns 0 for empty arrays.
 *
 * @example
 * mean([1, 2, 3, 4, 5]) // returns 3
 * mean([]) // returns 0
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

/**
 * Simple period-over-period returns: (p[t] - p[t-1]) / p[t-1].
 * A series of n prices yields n - 1 returns.
 *
 * @example
 * simpleReturns([100, 110, 99]) // returns [0.1, -0.1]
 */
export function simpleReturns(prices: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    const previous = prices[i - 1];
    returns.push(previous === 0 ? 0 : (prices[i] - previous) / previous);
  }
  return returns;
}

/**
 * Pearson correlation coefficient between two equally long series.
 * Returns 0 when either series has zero variance or the lengths differ,
 * since no co-movement can be measured in that case.
 *
 * @example
 * pearsonCorrelation([1, 2, 3], [2, 4, 6]) // returns 1
 * pearsonCorrelation([1, 2, 3], [3, 2, 1]) // returns -1
 */
export function pearsonCorrelation(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length < 2) return 0;

  const aMean = mean(a);
  const bMean = mean(b);

  let covariance = 0;
  let aVariance = 0;
  let bVariance = 0;

  for (let i = 0; i < a.length; i++) {
    const aDiff = a[i] - aMean;
    const bDiff = b[i] - bMean;
    covariance += aDiff * bDiff;
    aVariance += aDiff * aDiff;
    bVariance += bDiff * bDiff;
  }

  if (aVariance === 0 || bVariance === 0) return 0;

  return clamp(covariance / Math.sqrt(aVariance * bVariance), -1, 1);
}

/**
 * Weighted sum of several aligned series, position by position.
 * All series must share the length of the first one.
 *
 * @example
 * weightedSeries([[1, 2], [3, 4]], [0.5, 0.5]) // returns [2, 3]
 */
export function weightedSeries(
  series: readonly (readonly number[])[],
  weights: readonly number[],
): number[] {
  if (series.length === 0) return [];
  const length = series[0].length;
  const result = new Array<number>(length).fill(0);

  series.forEach((values, index) => {
    const weight = weights[index] ?? 0;
    for (let i = 0; i < length; i++) {
      result[i] += weight * values[i];
    }
  });

  return result;
}

// ============================================================================
// NUMERIC HELPERS
// ============================================================================

/**
 * Clamps a value between a minimum and maximum.
 *
 * @example
 * clamp(150, 0, 100) // returns 100
 * clamp(-5, 0, 100) // returns 0
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Rounds a number to a specified number of decimal places.
 *
 * @example
 * round(3.14159, 2) // returns 3.14
 */
export function round(value: number, decimals: number): number {
  const multiplier = Math.pow(10, decimals);
  return Math.round(value * multiplier) / multiplier;
}

/**
 * Rounds a number to 1 decimal place.
 */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Rounds a number to 2 decimal places.
 *
 * @example
 * round2(3.14159) // returns 3.14
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Relative difference |a - b| / max(|a|, |b|). Returns 0 when both are 0.
 */
export function relativeDifference(a: number, b: number): number {
  const scale = Math.max(Math.abs(a), Math.abs(b));
  return scale === 0 ? 0 : Math.abs(a - b) / scale;
}
