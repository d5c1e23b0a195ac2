import type { ForecastConfig } from '@/core/config';
import type { RegimeMethod, VolatilityRegime } from '@/types/opportunity';
import { percentile } from './statistics';

export interface RegimeClassification {
  regime: VolatilityRegime;
  method: RegimeMethod;
  thresholds: { low: number; high: number };
}

/**
 * Places the current estimate against the instrument's own rolling history.
 * With fewer than minRegimeSamples rolling values the fixed annualized
 * thresholds apply instead.
 */
export function classifyRegime(
  current: number,
  rollingHistory: number[],
  config: Pick<ForecastConfig, 'regimePercentiles' | 'minRegimeSamples' | 'fallbackRegimeThresholds'>
): RegimeClassification {
  const usePercentiles = rollingHistory.length >= config.minRegimeSamples;
  const thresholds = usePercentiles
    ? {
        low: percentile(rollingHistory, config.regimePercentiles.low),
        high: percentile(rollingHistory, config.regimePercentiles.high),
      }
    : { ...config.fallbackRegimeThresholds };

  let regime: VolatilityRegime = 'normal';
  if (current < thresholds.low) regime = 'low';
  else if (current > thresholds.high) regime = 'high';

  return {
    regime,
    method: usePercentiles ? 'percentile' : 'fixed_threshold',
    thresholds,
  };
}

/**
 * Prefers annualized volatility between 20% and 40% and a short/long ratio
 * close to 1. Bounded to [25, 80] by construction.
 */
export function volatilityScore(annualized: number, ratio: number): number {
  const pct = annualized * 100;
  let score = 50;

  if (pct >= 20 && pct <= 40) score += 20;
  else if ((pct >= 15 && pct < 20) || (pct > 40 && pct <= 50)) score += 10;
  else if (pct > 60) score -= 10;

  if (ratio >= 0.8 && ratio <= 1.2) score += 10;
  else if (ratio > 1.2 && ratio <= 1.5) score += 5;
  else if (ratio > 2) score -= 15;

  return score;
}
