import { describe, it, expect } from 'vitest';
import { buildConfig, DEFAULT_CONFIG } from '@/core/config';
import { runScreen } from '@/pipeline/run_screen';
import { checkRunConsistency } from '@/run/validator';
import { makeUniverse } from '../helpers/universe';

describe('checkRunConsistency', () => {
  it('passes a fresh run', () => {
    const result = runScreen(makeUniverse(12), DEFAULT_CONFIG);
    expect(checkRunConsistency(result, DEFAULT_CONFIG)).toEqual({ passed: true, issues: [] });
  });

  it('flags gaps in the ranks', () => {
    const result = runScreen(makeUniverse(4), DEFAULT_CONFIG);
    const tampered = {
      ...result,
      opportunities: result.opportunities.map((o, i) => (i === 1 ? { ...o, rank: 7 } : o)),
    };
    const { passed, issues } = checkRunConsistency(tampered, DEFAULT_CONFIG);
    expect(passed).toBe(false);
    expect(issues).toContain(`Rank 7 at position 2 for ${result.opportunities[1].id}`);
  });

  it('flags exposure above the caps', () => {
    const result = runScreen(makeUniverse(4), DEFAULT_CONFIG);
    const tampered = {
      ...result,
      allocation: { ...result.allocation, totalPct: 95 },
    };
    const { issues } = checkRunConsistency(tampered, DEFAULT_CONFIG);
    expect(issues).toContain('Total exposure 95% exceeds cap 80%');
  });

  it('flags unaccounted records', () => {
    const result = runScreen(makeUniverse(3), DEFAULT_CONFIG);
    const tampered = { ...result, counts: { ...result.counts, received: 5 } };
    const { issues } = checkRunConsistency(tampered, DEFAULT_CONFIG);
    expect(issues[0]).toBe('received 5 != intakeRejected 0 + truncated 0 + processed 3');
  });

  it('flags eligible instruments missing from the shortlist and the audit', () => {
    const config = buildConfig({ ranking: { min_composite_score: 70 } });
    const result = runScreen(makeUniverse(12), config);
    const { eligible, shortlisted, belowMinimum } = result.counts;
    const tampered = {
      ...result,
      audit: { ...result.audit, belowMinimum: [] },
      counts: { ...result.counts, belowMinimum: 0 },
    };

    const { passed, issues } = checkRunConsistency(tampered, config);
    expect(belowMinimum).toBeGreaterThan(0);
    expect(passed).toBe(false);
    expect(issues).toContain(
      `eligible ${eligible} != shortlisted ${shortlisted} + belowMinimum 0 + notSelected 0`
    );
  });

  it('flags a below-minimum entry that actually met the minimum', () => {
    const config = buildConfig({ ranking: { min_composite_score: 70 } });
    const result = runScreen(makeUniverse(12), config);
    const [first] = result.audit.belowMinimum;
    const tampered = {
      ...result,
      audit: {
        ...result.audit,
        belowMinimum: [{ ...first, composite: 72 }, ...result.audit.belowMinimum.slice(1)],
      },
    };

    const { issues } = checkRunConsistency(tampered, config);
    expect(issues).toEqual([`${first.id} listed below minimum with composite 72 >= 70`]);
  });
});
