/**
 * Run Validator
 * Re-checks a finished run against the ranking, scoring and allocation invariants
 */

import type { ScreenerConfig } from '@/core/config';
import { compareCandidates } from '@/ranking/ranker';
import { gradeFor } from '@/scoring/composite';
import type { ScreenRunResult } from '@/types/opportunity';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('run_validator');

const EPSILON = 1e-9;

export interface ConsistencyCheck {
  passed: boolean;
  issues: string[];
}

export function checkRunConsistency(run: ScreenRunResult, config: ScreenerConfig): ConsistencyCheck {
  const issues: string[] = [];
  const { counts, opportunities, audit, allocation } = run;

  // Every received record is accounted for exactly once
  if (counts.received !== counts.intakeRejected + counts.truncated + counts.processed) {
    issues.push(
      `received ${counts.received} != intakeRejected ${counts.intakeRejected} + truncated ${counts.truncated} + processed ${counts.processed}`
    );
  }
  const dropped = audit.forecastFailures.filter((f) => f.dropped).length;
  if (counts.processed !== counts.eligible + counts.rejected + dropped) {
    issues.push(
      `processed ${counts.processed} != eligible ${counts.eligible} + rejected ${counts.rejected} + dropped ${dropped}`
    );
  }
  if (counts.forecastFailed !== audit.forecastFailures.length) {
    issues.push(`forecastFailed ${counts.forecastFailed} != ${audit.forecastFailures.length} audit entries`);
  }
  if (counts.shortlisted !== opportunities.length) {
    issues.push(`shortlisted ${counts.shortlisted} != ${opportunities.length} opportunities`);
  }
  if (counts.eligible !== counts.shortlisted + counts.belowMinimum + counts.notSelected) {
    issues.push(
      `eligible ${counts.eligible} != shortlisted ${counts.shortlisted} + belowMinimum ${counts.belowMinimum} + notSelected ${counts.notSelected}`
    );
  }
  if (counts.belowMinimum !== audit.belowMinimum.length) {
    issues.push(`belowMinimum ${counts.belowMinimum} != ${audit.belowMinimum.length} audit entries`);
  }
  if (counts.notSelected !== run.selection.notSelected.length) {
    issues.push(`notSelected ${counts.notSelected} != ${run.selection.notSelected.length} listed ids`);
  }
  if (counts.notSelected > 0 && counts.shortlisted < config.ranking.shortlistSize) {
    issues.push(
      `${counts.notSelected} qualifying candidates left out of a shortlist of ${counts.shortlisted} under size ${config.ranking.shortlistSize}`
    );
  }
  for (const entry of audit.belowMinimum) {
    if (entry.composite >= config.ranking.minCompositeScore) {
      issues.push(
        `${entry.id} listed below minimum with composite ${entry.composite} >= ${config.ranking.minCompositeScore}`
      );
    }
  }
  if (opportunities.length > config.ranking.shortlistSize) {
    issues.push(`Shortlist of ${opportunities.length} exceeds size ${config.ranking.shortlistSize}`);
  }

  opportunities.forEach((opp, index) => {
    if (opp.rank !== index + 1) {
      issues.push(`Rank ${opp.rank} at position ${index + 1} for ${opp.id}`);
    }
    if (index > 0 && compareCandidates(opportunities[index - 1], opp) >= 0) {
      issues.push(`${opp.id} is out of order after ${opportunities[index - 1].id}`);
    }

    const { grade, ...numeric } = opp.scores;
    for (const [name, value] of Object.entries(numeric)) {
      if (value < 0 || value > 100) {
        issues.push(`Invalid ${name} score for ${opp.id}: ${value}`);
      }
    }
    if (grade !== gradeFor(opp.scores.composite)) {
      issues.push(`Grade ${grade} does not match composite ${opp.scores.composite} for ${opp.id}`);
    }

    if ((opp.volatility?.regime ?? 'high') === 'high' && opp.riskCategory === 'conservative') {
      issues.push(`${opp.id} is conservative in the high volatility regime`);
    }

    if (opp.volatility) {
      const { bear, base, bull } = opp.volatility.forecast;
      if (!(bear.price <= base.price && base.price <= bull.price)) {
        issues.push(`Scenario order broken for ${opp.id}: ${bear.price} / ${base.price} / ${bull.price}`);
      }
      const probability = bear.probability + base.probability + bull.probability;
      if (Math.abs(probability - 1) > EPSILON) {
        issues.push(`Scenario probabilities for ${opp.id} sum to ${probability}`);
      }
    }

    if (opp.scores.composite < config.ranking.minCompositeScore) {
      issues.push(`${opp.id} shortlisted under the minimum composite score`);
    }

    if (opp.positionSizePct < 0) {
      issues.push(`Negative position size for ${opp.id}`);
    }
  });

  const summed = opportunities.reduce((sum, o) => sum + o.positionSizePct, 0);
  if (Math.abs(summed - allocation.totalPct) > 1e-6) {
    issues.push(`Position sizes sum to ${summed}, allocation reports ${allocation.totalPct}`);
  }
  if (allocation.totalPct > config.sizing.totalExposureCap + EPSILON) {
    issues.push(`Total exposure ${allocation.totalPct}% exceeds cap ${config.sizing.totalExposureCap}%`);
  }
  for (const [sector, pct] of Object.entries(allocation.bySectorPct)) {
    if (pct > config.sizing.sectorCap + EPSILON) {
      issues.push(`Sector ${sector} exposure ${pct}% exceeds cap ${config.sizing.sectorCap}%`);
    }
  }

  const backfilled = new Set(run.selection.backfilled);
  for (const [sector, count] of Object.entries(run.selection.sectorCounts)) {
    const overCap = count > run.selection.sectorLimit;
    const explained = opportunities.some((o) => o.sector === sector && backfilled.has(o.id));
    if (overCap && !explained) {
      issues.push(`Sector ${sector} holds ${count} entries over limit ${run.selection.sectorLimit}`);
    }
  }

  if (issues.length > 0) {
    logger.warn({ issues }, 'Run consistency check failed');
  }

  return { passed: issues.length === 0, issues };
}
