/**
 * Volatility & forecast model.
 *
 * Estimates realized volatility from an instrument's own history, places it
 * in a regime relative to that history and projects weekly price scenarios.
 * Pure per instrument: the same bundle and config always give the same profile.
 */

import type { ForecastConfig } from '@/core/config';
import { roundScore } from '@/scoring/normalize';
import type { MetricBundle } from '@/types/metric_bundle';
import type { VolatilityProfile } from '@/types/opportunity';
import {
  atrPercent,
  bandWidthPercent,
  dailyReturnVolatility,
  movingAverageDrift,
  parkinsonVolatility,
  rollingVolatilityHistory,
  volatilityRatio,
} from './estimators';
import { classifyRegime, volatilityScore } from './regime';
import { buildForecastScenario } from './scenarios';
import { assertUsableSeries } from './series';

const round4 = (value: number) => roundScore(value, 4);

/**
 * Throws InvalidSeriesError for malformed history and
 * InsufficientHistoryError when fewer than minHistory bars exist.
 */
export function buildVolatilityProfile(
  bundle: MetricBundle,
  config: ForecastConfig
): VolatilityProfile {
  assertUsableSeries(bundle, config.minHistory);

  const bars = bundle.history;
  const closes = bars.map((bar) => bar.close);
  const annualize = Math.sqrt(config.tradingPeriodsPerYear);

  const daily = dailyReturnVolatility(closes, config.lookbackWindow);
  const realized = daily * annualize;
  const horizon = daily * Math.sqrt(config.horizonDays);

  const regime = classifyRegime(
    realized,
    rollingVolatilityHistory(closes, config.lookbackWindow, config.tradingPeriodsPerYear),
    config
  );

  const ratio = volatilityRatio(closes, config.lookbackWindow, config.longLookbackWindow);

  const rawDrift = movingAverageDrift(closes, config.lookbackWindow, config.horizonDays);
  const drift = Math.min(Math.max(rawDrift, -horizon), horizon);

  return {
    realizedVolatility: round4(realized),
    parkinsonVolatility: round4(
      parkinsonVolatility(bars, config.lookbackWindow, config.tradingPeriodsPerYear)
    ),
    atrPercent: roundScore(atrPercent(bars, config.atrPeriod, bundle.currentPrice), 2),
    bandWidthPercent: roundScore(bandWidthPercent(closes, config.bandPeriod), 2),
    regime: regime.regime,
    regimeMethod: regime.method,
    regimeThresholds: {
      low: round4(regime.thresholds.low),
      high: round4(regime.thresholds.high),
    },
    volatilityRatio: round4(ratio),
    volatilityScore: volatilityScore(realized, ratio),
    dailyVolatility: round4(daily),
    weeklyVolatility: round4(horizon),
    trendDrift: round4(drift),
    forecast: buildForecastScenario({
      currentPrice: bundle.currentPrice,
      horizonVolatility: horizon,
      trendDrift: drift,
      horizonDays: config.horizonDays,
    }),
  };
}

export class ForecastModel {
  constructor(private readonly config: ForecastConfig) {}

  profile(bundle: MetricBundle): VolatilityProfile {
    return buildVolatilityProfile(bundle, this.config);
  }
}
