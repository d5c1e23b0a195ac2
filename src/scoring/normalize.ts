/**
 * Score normalization utilities
 * All sub-scores live on a 0-100 scale
 */

export type CurvePoint = readonly [x: number, y: number];

export function clamp(value: number, min: number = 0, max: number = 100): number {
  return Math.min(Math.max(value, min), max);
}

export function inverseLinearScale(
  value: number,
  inputMin: number,
  inputMax: number,
  outputMin: number = 0,
  outputMax: number = 100
): number {
  // Lower input values = higher output scores
  if (inputMax === inputMin) return (outputMin + outputMax) / 2;

  const normalized = (value - inputMin) / (inputMax - inputMin);
  return clamp(outputMax - normalized * (outputMax - outputMin), outputMin, outputMax);
}

/**
 * Piecewise-linear curve through ascending x points.
 * Flat beyond the first and last point, so the output stays bounded.
 */
export function interpolate(points: readonly CurvePoint[], value: number): number {
  if (points.length === 0) {
    throw new Error('interpolate needs at least one point');
  }
  const [firstX, firstY] = points[0];
  if (value <= firstX) return firstY;

  for (let i = 1; i < points.length; i++) {
    const [x0, y0] = points[i - 1];
    const [x1, y1] = points[i];
    if (value <= x1) {
      if (x1 === x0) return y1;
      return y0 + ((value - x0) / (x1 - x0)) * (y1 - y0);
    }
  }
  return points[points.length - 1][1];
}

/**
 * Mid-rank percentile of value within peers (value included in peers).
 * Ties share the average rank; a single peer scores 50.
 */
export function midRankPercentile(value: number, peers: readonly number[]): number {
  if (peers.length <= 1) return 50;
  const below = peers.filter((v) => v < value).length;
  const equal = peers.filter((v) => v === value).length;
  const midRank = below + (equal - 1) / 2;
  return (midRank / (peers.length - 1)) * 100;
}

export function roundScore(score: number, decimals: number = 1): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}
