/**
 * Composite scorer: fixed-weight sum of the five sub-scores, mapped to a
 * letter grade and a conviction level.
 */

import type { ScoringWeights } from '@/core/config';
import { numericFigure, type MetricBundle } from '@/types/metric_bundle';
import type { ConvictionLevel, Grade, ScoreBreakdown } from '@/types/opportunity';
import { clamp, roundScore } from './normalize';
import {
  FigureReader,
  growthScore,
  innovationScore,
  riskRewardScore,
  teamExecutionScore,
  technicalSetupScore,
} from './subscores';

const GRADE_BANDS: ReadonlyArray<[number, Grade]> = [
  [90, 'A+'],
  [85, 'A'],
  [80, 'A-'],
  [75, 'B+'],
  [70, 'B'],
  [65, 'B-'],
  [60, 'C'],
];

const CONVICTION_BANDS: ReadonlyArray<[number, ConvictionLevel]> = [
  [85, 'Very High'],
  [75, 'High'],
  [65, 'Medium'],
  [55, 'Low'],
];

export function gradeFor(composite: number): Grade {
  return GRADE_BANDS.find(([floor]) => composite >= floor)?.[1] ?? 'F';
}

export function convictionFor(composite: number): ConvictionLevel {
  return CONVICTION_BANDS.find(([floor]) => composite >= floor)?.[1] ?? 'Very Low';
}

/** Market caps of the instruments being scored, keyed by sector. */
export type SectorContext = ReadonlyMap<string, readonly number[]>;

export function buildSectorContext(bundles: readonly MetricBundle[]): SectorContext {
  const context = new Map<string, number[]>();
  for (const bundle of bundles) {
    const marketCap = numericFigure(bundle.figures, 'market_cap');
    if (marketCap === null) continue;
    const peers = context.get(bundle.sector) ?? [];
    peers.push(marketCap);
    context.set(bundle.sector, peers);
  }
  return context;
}

export interface CompositeScoreResult {
  scores: ScoreBreakdown;
  conviction: ConvictionLevel;
  assumptions: string[];
}

const toScore = (value: number) => roundScore(clamp(value), 2);

export function computeCompositeScore(
  bundle: MetricBundle,
  weights: ScoringWeights,
  sectorContext: SectorContext
): CompositeScoreResult {
  const reader = new FigureReader(bundle);

  const innovation = toScore(
    innovationScore(bundle, reader, sectorContext.get(bundle.sector) ?? []).score
  );
  const growth = toScore(growthScore(reader).score);
  const teamExecution = toScore(teamExecutionScore(reader).score);
  const riskReward = toScore(riskRewardScore(reader).score);
  const technicalSetup = toScore(technicalSetupScore(bundle, reader).score);

  const composite = toScore(
    innovation * weights.innovation +
      growth * weights.growth +
      teamExecution * weights.teamExecution +
      riskReward * weights.riskReward +
      technicalSetup * weights.technicalSetup
  );

  return {
    scores: {
      innovation,
      growth,
      teamExecution,
      riskReward,
      technicalSetup,
      composite,
      grade: gradeFor(composite),
    },
    conviction: convictionFor(composite),
    assumptions: reader.assumptions,
  };
}

export class CompositeScorer {
  constructor(private readonly weights: ScoringWeights) {}

  score(bundle: MetricBundle, sectorContext: SectorContext): CompositeScoreResult {
    return computeCompositeScore(bundle, this.weights, sectorContext);
  }
}
