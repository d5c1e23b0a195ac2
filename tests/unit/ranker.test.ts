import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '@/core/config';
import {
  assignRiskCategory,
  compareCandidates,
  rankCandidates,
  Ranker,
  sortCandidates,
  type ScoredCandidate,
} from '@/ranking/ranker';
import { makeScores } from '../helpers/bundles';

const ranking = DEFAULT_CONFIG.ranking;

function candidate(id: string, composite: number, growth = 60, sector = 'Technology'): ScoredCandidate {
  return {
    id,
    sector,
    currentPrice: 25,
    scores: makeScores(composite, growth),
    conviction: 'High',
    assumptions: [],
    volatility: null,
  };
}

describe('compareCandidates', () => {
  it('breaks equal composites on the growth score', () => {
    const sorted = sortCandidates([candidate('SLOW', 82, 70), candidate('FAST', 82, 75)]);
    expect(sorted.map((c) => c.id)).toEqual(['FAST', 'SLOW']);
  });

  it('falls back to the identifier in code-unit order', () => {
    const sorted = sortCandidates([
      candidate('beta', 70, 50),
      candidate('Zeta', 70, 50),
      candidate('ALPHA', 70, 50),
    ]);
    expect(sorted.map((c) => c.id)).toEqual(['ALPHA', 'Zeta', 'beta']);
  });

  it('is a total order', () => {
    expect(compareCandidates(candidate('A', 80), candidate('A', 80))).toBe(0);
    expect(compareCandidates(candidate('A', 90), candidate('B', 80))).toBeLessThan(0);
  });
});

describe('assignRiskCategory', () => {
  it('looks up regime by score band', () => {
    expect(assignRiskCategory('low', 80, ranking)).toBe('conservative');
    expect(assignRiskCategory('low', 65, ranking)).toBe('moderate');
    expect(assignRiskCategory('low', 40, ranking)).toBe('aggressive');
    expect(assignRiskCategory('normal', 95, ranking)).toBe('moderate');
    expect(assignRiskCategory('high', 95, ranking)).toBe('aggressive');
    expect(assignRiskCategory('high', 65, ranking)).toBe('moderate');
  });

  it('treats a missing profile as the high regime', () => {
    expect(assignRiskCategory(null, 95, ranking)).toBe('aggressive');
  });
});

describe('rankCandidates', () => {
  it('assigns dense ranks in comparator order', () => {
    const result = rankCandidates(
      [candidate('C', 70), candidate('A', 90), candidate('B', 80)],
      ranking
    );
    expect(result.opportunities.map((o) => [o.rank, o.id])).toEqual([
      [1, 'A'],
      [2, 'B'],
      [3, 'C'],
    ]);
    expect(result.opportunities.every((o) => o.positionSizePct === 0)).toBe(true);
  });

  it('drops candidates under the minimum composite score', () => {
    const ranker = new Ranker({ ...ranking, minCompositeScore: 75 });
    const result = ranker.rank([candidate('LOW', 60), candidate('HIGH', 80), candidate('MID', 70)]);
    expect(result.opportunities.map((o) => o.id)).toEqual(['HIGH']);
    expect(result.belowMinimum).toEqual([
      { id: 'MID', composite: 70 },
      { id: 'LOW', composite: 60 },
    ]);
    expect(result.selection.notSelected).toEqual([]);
  });

  it('lists qualifying candidates past the shortlist size in rank order', () => {
    const result = rankCandidates(
      [candidate('D', 60), candidate('A', 90), candidate('C', 70), candidate('B', 80)],
      { ...ranking, shortlistSize: 2 }
    );
    expect(result.opportunities.map((o) => o.id)).toEqual(['A', 'B']);
    expect(result.selection.notSelected).toEqual(['C', 'D']);
    expect(result.belowMinimum).toEqual([]);
  });

  it('re-sorts backfilled entries before ranking', () => {
    const result = rankCandidates(
      [candidate('T1', 95), candidate('T2', 90), candidate('H1', 60, 60, 'Healthcare')],
      { ...ranking, shortlistSize: 3, maxSectorShare: 0.34 }
    );
    // limit is 1 per sector, so T2 is deferred then backfilled ahead of H1
    expect(result.selection.deferred).toEqual(['T2']);
    expect(result.selection.backfilled).toEqual(['T2']);
    expect(result.opportunities.map((o) => o.id)).toEqual(['T1', 'T2', 'H1']);
  });
});
