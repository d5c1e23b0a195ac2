/**
 * Position sizer. Works in integer basis points and scales down with floor,
 * so neither the total cap nor a sector cap can be exceeded through rounding.
 */

import type { SizingConfig } from '@/core/config';
import type { AllocationSummary, RankedOpportunity } from '@/types/opportunity';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('sizing');

const toBps = (pct: number) => Math.round(pct * 100);
const toPct = (bps: number) => bps / 100;

export interface SizingResult {
  opportunities: RankedOpportunity[];
  allocation: AllocationSummary;
}

function scaleDown(bps: number[], indices: number[], capBps: number): void {
  const sum = indices.reduce((total, i) => total + bps[i], 0);
  if (sum <= capBps) return;
  for (const i of indices) {
    bps[i] = Math.floor((bps[i] * capBps) / sum);
  }
}

export function sizePositions(
  opportunities: readonly RankedOpportunity[],
  config: SizingConfig
): SizingResult {
  const bps = opportunities.map((o) =>
    toBps(config.positionSizeTable[o.scores.grade][o.riskCategory])
  );
  const allIndices = opportunities.map((_, i) => i);

  const totalCapBps = toBps(config.totalExposureCap);
  const requestedBps = bps.reduce((sum, v) => sum + v, 0);
  const scaledForTotalCap = requestedBps > totalCapBps;
  scaleDown(bps, allIndices, totalCapBps);

  const bySector = new Map<string, number[]>();
  opportunities.forEach((o, i) => {
    const members = bySector.get(o.sector) ?? [];
    members.push(i);
    bySector.set(o.sector, members);
  });

  const sectorCapBps = toBps(config.sectorCap);
  const scaledSectors: string[] = [];
  for (const sector of [...bySector.keys()].sort()) {
    const members = bySector.get(sector) ?? [];
    const sum = members.reduce((total, i) => total + bps[i], 0);
    if (sum > sectorCapBps) {
      scaledSectors.push(sector);
      scaleDown(bps, members, sectorCapBps);
    }
  }

  if (scaledForTotalCap || scaledSectors.length > 0) {
    logger.info(
      { requestedPct: toPct(requestedBps), scaledForTotalCap, scaledSectors },
      'Position sizes scaled to exposure caps'
    );
  }

  const bySectorPct: Record<string, number> = {};
  for (const sector of [...bySector.keys()].sort()) {
    const members = bySector.get(sector) ?? [];
    bySectorPct[sector] = toPct(members.reduce((total, i) => total + bps[i], 0));
  }

  return {
    opportunities: opportunities.map((o, i) => ({ ...o, positionSizePct: toPct(bps[i]) })),
    allocation: {
      totalPct: toPct(bps.reduce((sum, v) => sum + v, 0)),
      bySectorPct,
      scaledForTotalCap,
      scaledSectors,
    },
  };
}

export class PositionSizer {
  constructor(private readonly config: SizingConfig) {}

  size(opportunities: readonly RankedOpportunity[]): SizingResult {
    return sizePositions(opportunities, this.config);
  }
}
