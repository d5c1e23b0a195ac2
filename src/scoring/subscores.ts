/**
 * The five sub-scores. Every input passes through a bounded curve
 * (piecewise-linear table, 1 - e^-x or tanh), so each sub-score is in
 * [0, 100] by construction. A missing figure contributes the neutral 50
 * and is noted in the assumptions list.
 */

import {
  isTrendClass,
  numericFigure,
  stringFigure,
  type MetricBundle,
  type TrendClass,
} from '@/types/metric_bundle';
import { resolvePEG } from './formulas/peg';
import { interpolate, inverseLinearScale, midRankPercentile, type CurvePoint } from './normalize';

export const NEUTRAL_SCORE = 50;

/** Disruption potential by sector; unlisted sectors score neutral. */
export const SECTOR_DISRUPTION: Readonly<Record<string, number>> = {
  Technology: 90,
  Healthcare: 80,
  'Communication Services': 75,
  'Consumer Cyclical': 60,
  Industrials: 55,
  'Financial Services': 45,
  'Consumer Defensive': 40,
  Energy: 35,
  'Basic Materials': 35,
  'Real Estate': 30,
  Utilities: 25,
};

const GROSS_MARGIN_CURVE: readonly CurvePoint[] = [
  [0.1, 10],
  [0.2, 30],
  [0.4, 60],
  [0.6, 85],
  [0.8, 100],
];

const OPERATING_MARGIN_CURVE: readonly CurvePoint[] = [
  [-0.1, 0],
  [0, 30],
  [0.1, 55],
  [0.2, 75],
  [0.35, 100],
];

const ROIC_CURVE: readonly CurvePoint[] = [
  [-0.1, 0],
  [0, 15],
  [0.05, 35],
  [0.1, 60],
  [0.15, 80],
  [0.25, 100],
];

const ROE_CURVE: readonly CurvePoint[] = [
  [-0.1, 0],
  [0, 15],
  [0.08, 40],
  [0.15, 70],
  [0.25, 90],
  [0.35, 100],
];

const PROFIT_MARGIN_CURVE: readonly CurvePoint[] = [
  [-0.1, 0],
  [0, 30],
  [0.05, 50],
  [0.15, 80],
  [0.25, 100],
];

const CURRENT_RATIO_CURVE: readonly CurvePoint[] = [
  [0.5, 0],
  [1, 40],
  [1.5, 70],
  [2, 90],
  [3, 100],
];

// Oversold is a mild positive, the 50-70 band is healthy momentum, overbought fades.
const RSI_CURVE: readonly CurvePoint[] = [
  [20, 35],
  [30, 45],
  [50, 70],
  [60, 90],
  [70, 70],
  [80, 30],
];

export const TREND_SCORES: Readonly<Record<TrendClass, number>> = {
  strong_uptrend: 100,
  uptrend: 75,
  neutral: 50,
  downtrend: 25,
  strong_downtrend: 0,
};

export interface SubScoreResult {
  score: number;
  components: Record<string, number>;
}

/** Reads numeric figures and records every neutral fallback. */
export class FigureReader {
  readonly assumptions: string[] = [];

  constructor(private readonly bundle: MetricBundle) {}

  get(key: string): number | null {
    return numericFigure(this.bundle.figures, key);
  }

  /** Score from `score(value)`, or the neutral 50 when the figure is missing. */
  scoreOrNeutral(key: string, score: (value: number) => number): number {
    const value = this.get(key);
    if (value === null) {
      this.assume(`${key}: missing, neutral score (${NEUTRAL_SCORE})`);
      return NEUTRAL_SCORE;
    }
    return score(value);
  }

  assume(note: string): void {
    if (!this.assumptions.includes(note)) this.assumptions.push(note);
  }
}

const weighted = (parts: Array<[number, number]>) =>
  parts.reduce((sum, [score, weight]) => sum + score * weight, 0);

/**
 * Concave growth curve: -20% or worse scores 0, flat growth 20,
 * 30% about 93, saturating toward 100.
 */
export function growthCurve(rate: number): number {
  if (rate <= -0.2) return 0;
  if (rate < 0) return ((rate + 0.2) / 0.2) * 20;
  return 20 + 80 * (1 - Math.exp(-rate / 0.12));
}

/** Margin change in decimal points; +/-5 points moves the score about 38 either way. */
export function marginTrendCurve(delta: number): number {
  return 50 + 50 * Math.tanh(delta / 0.05);
}

export function leverageScore(debtToEquity: number): number {
  if (debtToEquity < 0) return 0;
  return inverseLinearScale(debtToEquity, 0.3, 2.5);
}

export function innovationScore(
  bundle: MetricBundle,
  reader: FigureReader,
  sectorMarketCaps: readonly number[]
): SubScoreResult {
  let sector = SECTOR_DISRUPTION[bundle.sector];
  if (sector === undefined) {
    reader.assume(`sector: "${bundle.sector}" unranked, neutral score (${NEUTRAL_SCORE})`);
    sector = NEUTRAL_SCORE;
  }
  const grossMargin = reader.scoreOrNeutral('gross_margin', (v) => interpolate(GROSS_MARGIN_CURVE, v));
  const scale = reader.scoreOrNeutral('market_cap', (v) =>
    midRankPercentile(v, sectorMarketCaps.length > 0 ? sectorMarketCaps : [v])
  );
  const operatingMargin = reader.scoreOrNeutral('operating_margin', (v) =>
    interpolate(OPERATING_MARGIN_CURVE, v)
  );

  return {
    score: weighted([
      [sector, 0.35],
      [grossMargin, 0.3],
      [scale, 0.2],
      [operatingMargin, 0.15],
    ]),
    components: { sector, grossMargin, scale, operatingMargin },
  };
}

export function growthScore(reader: FigureReader): SubScoreResult {
  const revenue = reader.scoreOrNeutral('revenue_growth', growthCurve);
  const earnings = reader.scoreOrNeutral('earnings_growth', growthCurve);
  const marginTrend = reader.scoreOrNeutral('margin_trend', marginTrendCurve);

  return {
    score: weighted([
      [revenue, 0.45],
      [earnings, 0.35],
      [marginTrend, 0.2],
    ]),
    components: { revenue, earnings, marginTrend },
  };
}

export function teamExecutionScore(reader: FigureReader): SubScoreResult {
  const roic = reader.scoreOrNeutral('roic', (v) => interpolate(ROIC_CURVE, v));
  const roe = reader.scoreOrNeutral('roe', (v) => interpolate(ROE_CURVE, v));
  const profitMargin = reader.scoreOrNeutral('profit_margin', (v) =>
    interpolate(PROFIT_MARGIN_CURVE, v)
  );

  return {
    score: weighted([
      [roic, 0.45],
      [roe, 0.35],
      [profitMargin, 0.2],
    ]),
    components: { roic, roe, profitMargin },
  };
}

export function riskRewardScore(reader: FigureReader): SubScoreResult {
  const growth = reader.get('earnings_growth') ?? reader.get('revenue_growth');
  const peg = resolvePEG(reader.get('pe_ratio'), growth, reader.get('peg_ratio'));
  if (peg.skipped) {
    reader.assume(`peg: ${peg.reason ?? 'unavailable'}, neutral score (${NEUTRAL_SCORE})`);
  }
  const valuation = peg.pegScore;
  const leverage = reader.scoreOrNeutral('debt_to_equity', leverageScore);
  const liquidity = reader.scoreOrNeutral('current_ratio', (v) => interpolate(CURRENT_RATIO_CURVE, v));
  const balance = weighted([
    [leverage, 0.6],
    [liquidity, 0.4],
  ]);

  return {
    score: weighted([
      [valuation, 0.6],
      [balance, 0.4],
    ]),
    components: { valuation, leverage, liquidity, balance },
  };
}

/**
 * Trend class from the `trend` figure, else from price against the
 * 20/50/200-period averages. Needs at least sma_50 and sma_200 to derive.
 */
export function classifyTrend(bundle: MetricBundle, reader: FigureReader): TrendClass | null {
  const reported = stringFigure(bundle.figures, 'trend');
  if (reported !== null && isTrendClass(reported)) return reported;

  const price = bundle.currentPrice;
  const sma20 = reader.get('sma_20');
  const sma50 = reader.get('sma_50');
  const sma200 = reader.get('sma_200');
  if (sma50 === null || sma200 === null) return null;

  if (sma20 !== null && price > sma20 && sma20 > sma50 && sma50 > sma200) return 'strong_uptrend';
  if (sma20 !== null && price < sma20 && sma20 < sma50 && sma50 < sma200) return 'strong_downtrend';
  if (price > sma50 && sma50 > sma200) return 'uptrend';
  if (price < sma50 && sma50 < sma200) return 'downtrend';
  return 'neutral';
}

/** High relative volume confirms an uptrend and condemns a downtrend. */
export function volumeConfirmation(trend: TrendClass, volumeRatio: number): number {
  const surge = Math.tanh((volumeRatio - 1) / 0.5);
  if (trend === 'strong_uptrend' || trend === 'uptrend') return 50 + 50 * surge;
  if (trend === 'strong_downtrend' || trend === 'downtrend') return 50 - 50 * surge;
  return NEUTRAL_SCORE;
}

export function technicalSetupScore(bundle: MetricBundle, reader: FigureReader): SubScoreResult {
  const trendClass = classifyTrend(bundle, reader);
  let trend = NEUTRAL_SCORE;
  if (trendClass === null) {
    reader.assume(`trend: unclassified, neutral score (${NEUTRAL_SCORE})`);
  } else {
    trend = TREND_SCORES[trendClass];
  }
  const rsi = reader.scoreOrNeutral('rsi', (v) => interpolate(RSI_CURVE, v));
  const volume = reader.scoreOrNeutral('volume_ratio', (v) =>
    volumeConfirmation(trendClass ?? 'neutral', v)
  );

  return {
    score: weighted([
      [trend, 0.5],
      [rsi, 0.3],
      [volume, 0.2],
    ]),
    components: { trend, rsi, volume },
  };
}
