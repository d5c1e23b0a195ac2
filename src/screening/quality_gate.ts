/**
 * Quality gate: a fixed, ordered list of eligibility predicates combined
 * with logical AND. A missing figure fails its predicate.
 */

import type { GateThresholds } from '@/core/config';
import { numericFigure, type MetricBundle } from '@/types/metric_bundle';
import type { EligibilityFailure, EligibilityVerdict } from '@/types/opportunity';

type Comparison = 'min' | 'max' | 'floor';

interface GatePredicate {
  name: string;
  field: string;
  comparison: Comparison;
  threshold: (gate: GateThresholds) => number;
  read: (bundle: MetricBundle) => number | null;
}

const figure = (key: string) => (bundle: MetricBundle) => numericFigure(bundle.figures, key);

function averageVolume(bundle: MetricBundle): number | null {
  const reported = numericFigure(bundle.figures, 'avg_volume');
  if (reported !== null) return reported;
  if (bundle.history.length === 0) return null;
  const total = bundle.history.reduce((sum, bar) => sum + bar.volume, 0);
  const avg = total / bundle.history.length;
  return Number.isFinite(avg) ? avg : null;
}

function currentPrice(bundle: MetricBundle): number | null {
  return Number.isFinite(bundle.currentPrice) ? bundle.currentPrice : null;
}

export const GATE_PREDICATES: readonly GatePredicate[] = [
  {
    name: 'min_market_cap',
    field: 'market_cap',
    comparison: 'min',
    threshold: (g) => g.minMarketCap,
    read: figure('market_cap'),
  },
  {
    name: 'min_avg_volume',
    field: 'avg_volume',
    comparison: 'min',
    threshold: (g) => g.minAvgVolume,
    read: averageVolume,
  },
  {
    name: 'min_price',
    field: 'currentPrice',
    comparison: 'min',
    threshold: (g) => g.minPrice,
    read: currentPrice,
  },
  {
    name: 'max_price',
    field: 'currentPrice',
    comparison: 'max',
    threshold: (g) => g.maxPrice,
    read: currentPrice,
  },
  {
    name: 'min_revenue_growth',
    field: 'revenue_growth',
    comparison: 'min',
    threshold: (g) => g.minRevenueGrowth,
    read: figure('revenue_growth'),
  },
  {
    name: 'max_debt_to_equity',
    field: 'debt_to_equity',
    comparison: 'max',
    threshold: (g) => g.maxDebtToEquity,
    read: figure('debt_to_equity'),
  },
  {
    name: 'min_current_ratio',
    field: 'current_ratio',
    comparison: 'min',
    threshold: (g) => g.minCurrentRatio,
    read: figure('current_ratio'),
  },
  {
    name: 'min_gross_margin',
    field: 'gross_margin',
    comparison: 'min',
    threshold: (g) => g.minGrossMargin,
    read: figure('gross_margin'),
  },
  {
    name: 'min_bankruptcy_score',
    field: 'bankruptcy_score',
    comparison: 'floor',
    threshold: (g) => g.minBankruptcyScore,
    read: figure('bankruptcy_score'),
  },
];

function check(
  value: number,
  comparison: Comparison,
  threshold: number
): EligibilityFailure['reason'] | null {
  switch (comparison) {
    case 'min':
      return value < threshold ? 'below_min' : null;
    case 'max':
      return value > threshold ? 'above_max' : null;
    case 'floor':
      return value <= threshold ? 'not_above_floor' : null;
  }
}

/** Evaluates every predicate so the verdict lists all failures, in predicate order. */
export function evaluateEligibility(bundle: MetricBundle, gate: GateThresholds): EligibilityVerdict {
  const failures: EligibilityFailure[] = [];

  for (const predicate of GATE_PREDICATES) {
    const threshold = predicate.threshold(gate);
    const value = predicate.read(bundle);
    const reason = value === null ? 'missing_field' : check(value, predicate.comparison, threshold);
    if (reason) {
      failures.push({
        predicate: predicate.name,
        field: predicate.field,
        reason,
        value,
        threshold,
      });
    }
  }

  return {
    eligible: failures.length === 0,
    failedPredicates: failures.map((f) => f.predicate),
    failures,
  };
}

export function describeFailure(failure: EligibilityFailure): string {
  if (failure.reason === 'missing_field') {
    return `${failure.predicate}: ${failure.field} missing`;
  }
  const operator = { below_min: '<', above_max: '>', not_above_floor: '<=' }[failure.reason];
  return `${failure.predicate}: ${failure.field} ${failure.value} ${operator} ${failure.threshold}`;
}

export class QualityGate {
  constructor(private readonly thresholds: GateThresholds) {}

  evaluate(bundle: MetricBundle): EligibilityVerdict {
    return evaluateEligibility(bundle, this.thresholds);
  }
}
