import { describe, it, expect } from 'vitest';
import { applySectorCap, sectorLimitFor } from '@/selection/selector';

function series(prefix: string, sector: string, count: number) {
  return Array.from({ length: count }, (_, i) => ({
    id: `${prefix}${String(i + 1).padStart(2, '0')}`,
    sector,
  }));
}

describe('sectorLimitFor', () => {
  it('floors the share of the shortlist with a minimum of one', () => {
    expect(sectorLimitFor(20, 0.4)).toBe(8);
    expect(sectorLimitFor(10, 0.35)).toBe(3);
    expect(sectorLimitFor(5, 0.1)).toBe(1);
  });
});

describe('applySectorCap', () => {
  it('admits at most 8 of 20 from one sector and defers the 9th', () => {
    const ranked = [
      ...series('T', 'Technology', 10),
      ...series('H', 'Healthcare', 6),
      ...series('E', 'Energy', 6),
    ];
    const result = applySectorCap(ranked, 20, 0.4);

    expect(result.selected).toHaveLength(20);
    expect(result.sectorCounts).toEqual({ Energy: 6, Healthcare: 6, Technology: 8 });
    expect(result.deferred).toEqual(['T09', 'T10']);
    expect(result.backfilled).toEqual([]);
    expect(result.selected.map((c) => c.id)).not.toContain('T09');
    expect(result.selected.map((c) => c.id)).toContain('H01');
    expect(result.sectorShares).toEqual({ Energy: 0.3, Healthcare: 0.3, Technology: 0.4 });
  });

  it('backfills deferred candidates in rank order when the list is short', () => {
    const ranked = [...series('T', 'Technology', 10), ...series('H', 'Healthcare', 2)];
    const result = applySectorCap(ranked, 10, 0.4);

    expect(result.sectorLimit).toBe(4);
    expect(result.deferred).toEqual(['T05', 'T06', 'T07', 'T08', 'T09', 'T10']);
    expect(result.backfilled).toEqual(['T05', 'T06', 'T07', 'T08']);
    expect(result.selected.map((c) => c.id)).toEqual([
      'T01', 'T02', 'T03', 'T04', 'H01', 'H02', 'T05', 'T06', 'T07', 'T08',
    ]);
    expect(result.sectorCounts).toEqual({ Healthcare: 2, Technology: 8 });
  });

  it('returns everything when the universe is smaller than the shortlist', () => {
    const result = applySectorCap(series('A', 'Energy', 3), 20, 0.4);
    expect(result.selected).toHaveLength(3);
    expect(result.deferred).toEqual([]);
  });

  it('handles an empty batch', () => {
    const result = applySectorCap([], 20, 0.4);
    expect(result.selected).toEqual([]);
    expect(result.sectorCounts).toEqual({});
  });
});
