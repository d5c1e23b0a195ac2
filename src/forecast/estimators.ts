/**
 * Volatility estimators over an ascending bar series.
 * Annualized figures are decimals (0.25 = 25%); *Percent figures are percents.
 */

import type { PriceBar } from '@/types/metric_bundle';
import { logReturns, mean, sampleStdDev, simpleMovingAverage } from './statistics';

/** Daily standard deviation of the last `window` log returns, or all of them when fewer. */
export function dailyReturnVolatility(closes: number[], window: number): number {
  return sampleStdDev(logReturns(closes).slice(-window));
}

export function realizedVolatility(
  closes: number[],
  window: number,
  periodsPerYear: number
): number {
  return dailyReturnVolatility(closes, window) * Math.sqrt(periodsPerYear);
}

/** Ratio of the short-window to the long-window daily estimate; 1 when the long one is zero. */
export function volatilityRatio(closes: number[], shortWindow: number, longWindow: number): number {
  const long = dailyReturnVolatility(closes, longWindow);
  return long > 0 ? dailyReturnVolatility(closes, shortWindow) / long : 1;
}

/** Parkinson high/low range estimator over the last `window` bars. */
export function parkinsonVolatility(
  bars: PriceBar[],
  window: number,
  periodsPerYear: number
): number {
  const recent = bars.slice(-window);
  if (recent.length === 0) return 0;
  const squaredRanges = recent.map((bar) => Math.log(bar.high / bar.low) ** 2);
  const dailyVariance = mean(squaredRanges) / (4 * Math.LN2);
  return Math.sqrt(dailyVariance) * Math.sqrt(periodsPerYear);
}

export function trueRanges(bars: PriceBar[]): number[] {
  return bars.map((bar, i) => {
    if (i === 0) return bar.high - bar.low;
    const previousClose = bars[i - 1].close;
    return Math.max(
      bar.high - bar.low,
      Math.abs(bar.high - previousClose),
      Math.abs(bar.low - previousClose)
    );
  });
}

/** Average true range over the last `period` bars, as a percent of the reference price. */
export function atrPercent(bars: PriceBar[], period: number, referencePrice: number): number {
  const ranges = trueRanges(bars).slice(-period);
  if (ranges.length === 0 || referencePrice <= 0) return 0;
  return (mean(ranges) / referencePrice) * 100;
}

/** Width of a ±2σ band around the moving average, as a percent of that average. */
export function bandWidthPercent(closes: number[], period: number): number {
  const recent = closes.slice(-period);
  const average = mean(recent);
  if (recent.length < 2 || average <= 0) return 0;
  return ((4 * sampleStdDev(recent)) / average) * 100;
}

/**
 * Annualized realized volatility for every complete `window` of returns,
 * oldest first. The last entry matches realizedVolatility on the full series.
 */
export function rollingVolatilityHistory(
  closes: number[],
  window: number,
  periodsPerYear: number
): number[] {
  const returns = logReturns(closes);
  const history: number[] = [];
  const annualize = Math.sqrt(periodsPerYear);
  for (let end = window; end <= returns.length; end++) {
    history.push(sampleStdDev(returns.slice(end - window, end)) * annualize);
  }
  return history;
}

/**
 * Relative slope of the moving average across the horizon:
 * (sma[t] - sma[t - (horizonDays - 1)]) / sma[t - (horizonDays - 1)].
 * Zero when there are not enough averages to span the horizon.
 */
export function movingAverageDrift(closes: number[], period: number, horizonDays: number): number {
  const averages = simpleMovingAverage(closes, period);
  const span = horizonDays - 1;
  if (span <= 0 || averages.length <= span) return 0;
  const latest = averages[averages.length - 1];
  const earlier = averages[averages.length - 1 - span];
  return earlier > 0 ? (latest - earlier) / earlier : 0;
}
