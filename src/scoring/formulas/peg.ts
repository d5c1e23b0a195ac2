import { interpolate, type CurvePoint } from '../normalize';

export interface PEGCalculationResult {
  peg: number | null;
  pegScore: number;
  skipped: boolean;
  reason?: string;
}

// PEG at or under 0.5 scores 100, 3.0 and above scores 0
const PEG_CURVE: readonly CurvePoint[] = [
  [0.5, 100],
  [1.0, 75],
  [1.5, 50],
  [2.0, 25],
  [3.0, 0],
];

export function mapPegToScore(peg: number): number {
  return interpolate(PEG_CURVE, peg);
}

/**
 * Growth-adjusted valuation. Growth is a decimal (0.15 => 15%).
 * Skipped results carry the neutral score 50.
 */
export function calculatePEG(
  trailingPE: number | null,
  growth: number | null
): PEGCalculationResult {
  if (growth === null || !Number.isFinite(growth)) {
    return { peg: null, pegScore: 50, skipped: true, reason: 'no_growth_data' };
  }

  if (growth <= 0) {
    return { peg: null, pegScore: 50, skipped: true, reason: 'negative_or_zero_growth' };
  }

  if (trailingPE === null || !Number.isFinite(trailingPE)) {
    return { peg: null, pegScore: 50, skipped: true, reason: 'no_pe_data' };
  }

  if (trailingPE < 0) {
    return { peg: null, pegScore: 50, skipped: true, reason: 'negative_pe' };
  }

  const peg = trailingPE / (growth * 100);
  return { peg, pegScore: mapPegToScore(peg), skipped: false };
}

/** Falls back to a vendor-reported PEG when it cannot be computed. */
export function resolvePEG(
  trailingPE: number | null,
  growth: number | null,
  reportedPeg: number | null
): PEGCalculationResult {
  const computed = calculatePEG(trailingPE, growth);
  if (!computed.skipped) return computed;
  if (reportedPeg !== null && Number.isFinite(reportedPeg) && reportedPeg > 0) {
    return { peg: reportedPeg, pegScore: mapPegToScore(reportedPeg), skipped: false, reason: 'reported' };
  }
  return computed;
}
