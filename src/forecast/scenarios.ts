import { clamp, roundScore } from '@/scoring/normalize';
import type { ForecastScenario, PriceRange, ScenarioPoint } from '@/types/opportunity';

export const SCENARIO_PROBABILITIES = {
  bear: 0.16,
  base: 0.68,
  bull: 0.16,
} as const;

export interface ScenarioInput {
  currentPrice: number;
  /** Horizon volatility as a decimal, already scaled to horizonDays. */
  horizonVolatility: number;
  /** Expected relative move over the horizon; bounded to ±horizonVolatility. */
  trendDrift: number;
  horizonDays: number;
}

const toCents = (price: number) => roundScore(Math.max(0, price), 2);

function band(price: number, width: number): PriceRange {
  return { lower: toCents(price * (1 - width)), upper: toCents(price * (1 + width)) };
}

function scenarioPoint(currentPrice: number, move: number, probability: number): ScenarioPoint {
  const price = Math.max(0, currentPrice * (1 + move));
  return {
    price: toCents(price),
    changePct: roundScore(((price - currentPrice) / currentPrice) * 100, 2),
    probability,
  };
}

/**
 * Expected (±1σ) and extreme (±2σ) ranges plus bear/base/bull points.
 * Prices never go below zero; bear <= base <= bull holds because the
 * drift is clamped inside ±1σ.
 */
export function buildForecastScenario(input: ScenarioInput): ForecastScenario {
  const { currentPrice, horizonVolatility, horizonDays } = input;
  const drift = clamp(input.trendDrift, -horizonVolatility, horizonVolatility);

  return {
    horizonDays,
    expectedRange: band(currentPrice, horizonVolatility),
    extremeRange: band(currentPrice, 2 * horizonVolatility),
    bear: scenarioPoint(currentPrice, -horizonVolatility, SCENARIO_PROBABILITIES.bear),
    base: scenarioPoint(currentPrice, drift, SCENARIO_PROBABILITIES.base),
    bull: scenarioPoint(currentPrice, horizonVolatility, SCENARIO_PROBABILITIES.bull),
  };
}
