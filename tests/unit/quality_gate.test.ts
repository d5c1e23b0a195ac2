import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '@/core/config';
import { describeFailure, evaluateEligibility, QualityGate } from '@/screening/quality_gate';
import { makeBars, makeBundle } from '../helpers/bundles';

const gate = DEFAULT_CONFIG.gate;

describe('evaluateEligibility', () => {
  it('passes an instrument that clears every predicate', () => {
    const verdict = evaluateEligibility(makeBundle('PASS'), gate);
    expect(verdict).toEqual({ eligible: true, failedPredicates: [], failures: [] });
  });

  it('treats a missing figure as a failing predicate', () => {
    const verdict = evaluateEligibility(makeBundle('NOCAP', { figures: { market_cap: null } }), gate);
    expect(verdict.eligible).toBe(false);
    expect(verdict.failures).toEqual([
      {
        predicate: 'min_market_cap',
        field: 'market_cap',
        reason: 'missing_field',
        value: null,
        threshold: 100_000_000,
      },
    ]);
  });

  it('treats a non-numeric figure as missing', () => {
    const verdict = evaluateEligibility(
      makeBundle('TEXT', { figures: { current_ratio: 'n/a' } }),
      gate
    );
    expect(verdict.failedPredicates).toEqual(['min_current_ratio']);
    expect(verdict.failures[0].reason).toBe('missing_field');
  });

  it('reports every failure in predicate order', () => {
    const verdict = evaluateEligibility(
      makeBundle('MULTI', { figures: { gross_margin: 0.1, debt_to_equity: 3 } }),
      gate
    );
    expect(verdict.failedPredicates).toEqual(['max_debt_to_equity', 'min_gross_margin']);
  });

  it('requires the bankruptcy score strictly above its floor', () => {
    const atFloor = evaluateEligibility(makeBundle('Z', { figures: { bankruptcy_score: 1.81 } }), gate);
    expect(atFloor.failures[0]).toMatchObject({
      predicate: 'min_bankruptcy_score',
      reason: 'not_above_floor',
    });

    const above = evaluateEligibility(makeBundle('Z', { figures: { bankruptcy_score: 1.82 } }), gate);
    expect(above.eligible).toBe(true);
  });

  it('treats minimum thresholds as inclusive', () => {
    const verdict = evaluateEligibility(
      makeBundle('EDGE', { figures: { revenue_growth: 0.15, current_ratio: 1, debt_to_equity: 2 } }),
      gate
    );
    expect(verdict.eligible).toBe(true);
  });

  it('bounds the price on both sides', () => {
    expect(evaluateEligibility(makeBundle('PENNY', { currentPrice: 0.5 }), gate).failedPredicates).toEqual([
      'min_price',
    ]);
    expect(evaluateEligibility(makeBundle('HIGH', { currentPrice: 20_000 }), gate).failedPredicates).toEqual([
      'max_price',
    ]);
  });

  it('falls back to the mean bar volume when avg_volume is absent', () => {
    const liquid = makeBundle('VOL', {
      history: makeBars(30, { volume: 200_000 }),
      figures: { avg_volume: null },
    });
    expect(evaluateEligibility(liquid, gate).eligible).toBe(true);

    const thin = makeBundle('THIN', {
      history: makeBars(30, { volume: 50_000 }),
      figures: { avg_volume: null },
    });
    expect(evaluateEligibility(thin, gate).failures[0]).toMatchObject({
      predicate: 'min_avg_volume',
      reason: 'below_min',
      value: 50_000,
    });

    const empty = makeBundle('NOBARS', { history: [], currentPrice: 50, figures: { avg_volume: null } });
    expect(evaluateEligibility(empty, gate).failures[0].reason).toBe('missing_field');
  });
});

describe('describeFailure', () => {
  it('formats threshold and missing failures', () => {
    const verdict = evaluateEligibility(
      makeBundle('TXT', { figures: { debt_to_equity: 3, roe: null, gross_margin: null } }),
      gate
    );
    expect(verdict.failures.map(describeFailure)).toEqual([
      'max_debt_to_equity: debt_to_equity 3 > 2',
      'min_gross_margin: gross_margin missing',
    ]);
  });
});

describe('QualityGate', () => {
  it('evaluates against the thresholds it was built with', () => {
    const strict = new QualityGate({ ...gate, minMarketCap: 5_000_000_000 });
    expect(strict.evaluate(makeBundle('MID')).failedPredicates).toEqual(['min_market_cap']);
  });
});
