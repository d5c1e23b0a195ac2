/**
 * Input records handed over by the data-acquisition side.
 * Ratios are decimals (0.25 = 25%).
 */

export interface PriceBar {
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type FigureValue = number | string | null;

export type Figures = Record<string, FigureValue>;

export interface MetricBundle {
  id: string;
  sector: string;
  currentPrice: number;
  /** Ascending by timestamp, oldest first. */
  history: PriceBar[];
  figures: Figures;
}

export type TrendClass =
  | 'strong_uptrend'
  | 'uptrend'
  | 'neutral'
  | 'downtrend'
  | 'strong_downtrend';

export const TREND_CLASSES: readonly TrendClass[] = [
  'strong_uptrend',
  'uptrend',
  'neutral',
  'downtrend',
  'strong_downtrend',
];

export function isTrendClass(value: unknown): value is TrendClass {
  return typeof value === 'string' && TREND_CLASSES.some((trend) => trend === value);
}

/** Numeric figure lookup; strings, NaN and infinities read as missing. */
export function numericFigure(figures: Figures, key: string): number | null {
  const value = figures[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function stringFigure(figures: Figures, key: string): string | null {
  const value = figures[key];
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}
