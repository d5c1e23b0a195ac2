/**
 * Small numeric helpers shared by the volatility estimators.
 */

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1 denominator); 0 below two values. */
export function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

/**
 * Percentile with linear interpolation between closest ranks,
 * p in [0, 100].
 */
export function percentile(values: number[], p: number): number {
  if (values.length === 0) {
    throw new Error('Cannot take a percentile of an empty array');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const position = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const weight = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

export function logReturns(closes: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    returns.push(Math.log(closes[i] / closes[i - 1]));
  }
  return returns;
}

/** One average per complete window, oldest first. */
export function simpleMovingAverage(values: number[], period: number): number[] {
  if (period <= 0 || values.length < period) return [];
  const averages: number[] = [];
  let windowSum = values.slice(0, period).reduce((sum, v) => sum + v, 0);
  averages.push(windowSum / period);
  for (let i = period; i < values.length; i++) {
    windowSum += values[i] - values[i - period];
    averages.push(windowSum / period);
  }
  return averages;
}
