import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '@/core/config';
import {
  buildSectorContext,
  CompositeScorer,
  computeCompositeScore,
  convictionFor,
  gradeFor,
} from '@/scoring/composite';
import { makeBundle } from '../helpers/bundles';
import type { Figures } from '@/types/metric_bundle';

describe('grades', () => {
  it('maps contiguous bands over [0, 100]', () => {
    expect(gradeFor(100)).toBe('A+');
    expect(gradeFor(90)).toBe('A+');
    expect(gradeFor(89.99)).toBe('A');
    expect(gradeFor(85)).toBe('A');
    expect(gradeFor(80)).toBe('A-');
    expect(gradeFor(75)).toBe('B+');
    expect(gradeFor(70)).toBe('B');
    expect(gradeFor(65)).toBe('B-');
    expect(gradeFor(60)).toBe('C');
    expect(gradeFor(59.99)).toBe('F');
    expect(gradeFor(0)).toBe('F');
  });

  it('maps conviction levels', () => {
    expect(convictionFor(85)).toBe('Very High');
    expect(convictionFor(75)).toBe('High');
    expect(convictionFor(65)).toBe('Medium');
    expect(convictionFor(55)).toBe('Low');
    expect(convictionFor(54.99)).toBe('Very Low');
  });
});

describe('computeCompositeScore', () => {
  it('degrades every missing input to the neutral midpoint', () => {
    const bundle = { ...makeBundle('BARE', { sector: 'Widgets' }), figures: {} };
    const result = computeCompositeScore(bundle, DEFAULT_CONFIG.weights, new Map());

    expect(result.scores).toEqual({
      innovation: 50,
      growth: 50,
      teamExecution: 50,
      riskReward: 50,
      technicalSetup: 50,
      composite: 50,
      grade: 'F',
    });
    expect(result.conviction).toBe('Very Low');
    expect(result.assumptions).toHaveLength(16);
    expect(result.assumptions).toContain('peg: no_growth_data, neutral score (50)');
  });

  it('keeps every score inside [0, 100] for extreme inputs', () => {
    const extremes: Figures[] = [
      { revenue_growth: 50, earnings_growth: 50, roic: 9, roe: 9, gross_margin: 1, rsi: 100 },
      { revenue_growth: -5, earnings_growth: -5, roic: -9, roe: -9, debt_to_equity: 99, rsi: 0 },
    ];
    for (const figures of extremes) {
      const result = computeCompositeScore(
        makeBundle('EXT', { figures }),
        DEFAULT_CONFIG.weights,
        new Map()
      );
      const { grade: _grade, ...numeric } = result.scores;
      for (const value of Object.values(numeric)) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(100);
      }
    }
  });

  it('applies the configured weights', () => {
    const bundle = makeBundle('W');
    const onlyGrowth = { innovation: 0, growth: 1, teamExecution: 0, riskReward: 0, technicalSetup: 0 };
    const result = new CompositeScorer(onlyGrowth).score(bundle, new Map());
    expect(result.scores.composite).toBe(result.scores.growth);
  });
});

describe('buildSectorContext', () => {
  it('groups market caps by sector and skips missing ones', () => {
    const context = buildSectorContext([
      makeBundle('A', { sector: 'Energy', figures: { market_cap: 1 } }),
      makeBundle('B', { sector: 'Energy', figures: { market_cap: 2 } }),
      makeBundle('C', { sector: 'Utilities', figures: { market_cap: null } }),
    ]);
    expect(context.get('Energy')).toEqual([1, 2]);
    expect(context.has('Utilities')).toBe(false);
  });
});
