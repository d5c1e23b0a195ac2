/**
 * Ranker: deterministic total order over scored instruments, risk category
 * lookup and the sector-capped shortlist.
 */

import type { RankingConfig, ScoreBand } from '@/core/config';
import { applySectorCap } from '@/selection/selector';
import type {
  BelowMinimumEntry,
  ConvictionLevel,
  RankedOpportunity,
  RiskCategory,
  ScoreBreakdown,
  SelectionSummary,
  VolatilityProfile,
  VolatilityRegime,
} from '@/types/opportunity';

export interface ScoredCandidate {
  id: string;
  sector: string;
  currentPrice: number;
  scores: ScoreBreakdown;
  conviction: ConvictionLevel;
  assumptions: string[];
  volatility: VolatilityProfile | null;
}

// Code-unit order, independent of locale
const compareIds = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Composite desc, then growth desc, then identifier asc. */
export function compareCandidates(
  a: Pick<ScoredCandidate, 'id' | 'scores'>,
  b: Pick<ScoredCandidate, 'id' | 'scores'>
): number {
  if (b.scores.composite !== a.scores.composite) return b.scores.composite - a.scores.composite;
  if (b.scores.growth !== a.scores.growth) return b.scores.growth - a.scores.growth;
  return compareIds(a.id, b.id);
}

export function sortCandidates<T extends Pick<ScoredCandidate, 'id' | 'scores'>>(
  candidates: readonly T[]
): T[] {
  return candidates.slice().sort(compareCandidates);
}

export function scoreBand(composite: number, bands: RankingConfig['scoreBands']): ScoreBand {
  if (composite >= bands.high) return 'high';
  if (composite >= bands.mid) return 'mid';
  return 'low';
}

/** Without a volatility profile the instrument is treated as high regime. */
export function assignRiskCategory(
  regime: VolatilityRegime | null,
  composite: number,
  ranking: Pick<RankingConfig, 'scoreBands' | 'riskCategoryTable'>
): RiskCategory {
  return ranking.riskCategoryTable[regime ?? 'high'][scoreBand(composite, ranking.scoreBands)];
}

export interface RankingResult {
  opportunities: RankedOpportunity[];
  selection: SelectionSummary;
  /** In comparator order. */
  belowMinimum: BelowMinimumEntry[];
}

/**
 * Orders the candidates, selects the sector-capped shortlist and assigns
 * dense ranks 1..N. Position sizes are left at 0 for the sizer.
 */
export function rankCandidates(
  candidates: readonly ScoredCandidate[],
  config: RankingConfig
): RankingResult {
  const ordered = sortCandidates(candidates);
  const qualifying = ordered.filter((c) => c.scores.composite >= config.minCompositeScore);
  const belowMinimum = ordered
    .filter((c) => c.scores.composite < config.minCompositeScore)
    .map((c) => ({ id: c.id, composite: c.scores.composite }));

  const capped = applySectorCap(qualifying, config.shortlistSize, config.maxSectorShare);
  const shortlist = sortCandidates(capped.selected);
  const selectedIds = new Set(shortlist.map((c) => c.id));

  const opportunities = shortlist.map((c, index) => ({
    rank: index + 1,
    id: c.id,
    sector: c.sector,
    currentPrice: c.currentPrice,
    scores: c.scores,
    conviction: c.conviction,
    volatility: c.volatility,
    riskCategory: assignRiskCategory(c.volatility?.regime ?? null, c.scores.composite, config),
    positionSizePct: 0,
    assumptions: c.assumptions,
  }));

  return {
    opportunities,
    selection: {
      sectorLimit: capped.sectorLimit,
      deferred: capped.deferred,
      backfilled: capped.backfilled,
      notSelected: qualifying.filter((c) => !selectedIds.has(c.id)).map((c) => c.id),
      sectorCounts: capped.sectorCounts,
      sectorShares: capped.sectorShares,
    },
    belowMinimum,
  };
}

export class Ranker {
  constructor(private readonly config: RankingConfig) {}

  rank(candidates: readonly ScoredCandidate[]): RankingResult {
    return rankCandidates(candidates, this.config);
  }
}
