/**
 * Greedy, order-preserving shortlist selection with a per-sector cap.
 * Over-cap candidates are deferred, not discarded, and backfill the list
 * in rank order when a single pass leaves it short.
 */

import { roundScore } from '@/scoring/normalize';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('selection');

export interface SectorCapResult<T> {
  selected: T[];
  sectorLimit: number;
  deferred: string[];
  backfilled: string[];
  sectorCounts: Record<string, number>;
  sectorShares: Record<string, number>;
}

export function sectorLimitFor(targetCount: number, maxSectorShare: number): number {
  return Math.max(1, Math.floor(targetCount * maxSectorShare + 1e-9));
}

export function applySectorCap<T extends { id: string; sector: string }>(
  ranked: readonly T[],
  targetCount: number,
  maxSectorShare: number
): SectorCapResult<T> {
  const sectorLimit = sectorLimitFor(targetCount, maxSectorShare);
  const counts = new Map<string, number>();
  const selected: T[] = [];
  const capped: T[] = [];

  for (const candidate of ranked) {
    if (selected.length >= targetCount) break;

    const count = counts.get(candidate.sector) ?? 0;
    if (count >= sectorLimit) {
      capped.push(candidate);
      continue;
    }
    counts.set(candidate.sector, count + 1);
    selected.push(candidate);
  }

  // Backfill with best deferred (in sorted order) if the caps left the list short
  const backfilled: string[] = [];
  for (const candidate of capped) {
    if (selected.length >= targetCount) break;
    selected.push(candidate);
    backfilled.push(candidate.id);
    counts.set(candidate.sector, (counts.get(candidate.sector) ?? 0) + 1);
  }

  const deferred = capped.map((c) => c.id);
  if (deferred.length > 0) {
    logger.info({ sectorLimit, deferred, backfilled }, 'Sector cap deferred candidates');
  }

  const sectorCounts: Record<string, number> = {};
  const sectorShares: Record<string, number> = {};
  for (const sector of [...counts.keys()].sort()) {
    const count = counts.get(sector) ?? 0;
    sectorCounts[sector] = count;
    sectorShares[sector] = roundScore(count / selected.length, 4);
  }

  return { selected, sectorLimit, deferred, backfilled, sectorCounts, sectorShares };
}
