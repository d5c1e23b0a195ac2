/**
 * Derived entities produced by one screening run.
 * RankedOpportunity is the only record the reporting side consumes.
 */

export type VolatilityRegime = 'low' | 'normal' | 'high';

export type RegimeMethod = 'percentile' | 'fixed_threshold';

export type RiskCategory = 'conservative' | 'moderate' | 'aggressive';

export type Grade = 'A+' | 'A' | 'A-' | 'B+' | 'B' | 'B-' | 'C' | 'F';

export type ConvictionLevel = 'Very High' | 'High' | 'Medium' | 'Low' | 'Very Low';

export interface PriceRange {
  lower: number;
  upper: number;
}

export interface ScenarioPoint {
  price: number;
  changePct: number;
  probability: number;
}

export interface ForecastScenario {
  horizonDays: number;
  /** ±1σ band */
  expectedRange: PriceRange;
  /** ±2σ band */
  extremeRange: PriceRange;
  bear: ScenarioPoint;
  base: ScenarioPoint;
  bull: ScenarioPoint;
}

export interface VolatilityProfile {
  /** Annualized close-to-close estimate (decimal), the primary estimate. */
  realizedVolatility: number;
  /** Annualized high/low range estimate (decimal). */
  parkinsonVolatility: number;
  atrPercent: number;
  bandWidthPercent: number;
  regime: VolatilityRegime;
  regimeMethod: RegimeMethod;
  regimeThresholds: { low: number; high: number };
  /** Short-window over long-window estimate; above 1 means volatility is expanding. */
  volatilityRatio: number;
  /** 0-100, highest for moderate volatility that is neither expanding nor collapsing. */
  volatilityScore: number;
  dailyVolatility: number;
  weeklyVolatility: number;
  trendDrift: number;
  forecast: ForecastScenario;
}

export interface ScoreBreakdown {
  innovation: number;
  growth: number;
  teamExecution: number;
  riskReward: number;
  technicalSetup: number;
  composite: number;
  grade: Grade;
}

export interface RankedOpportunity {
  rank: number;
  id: string;
  sector: string;
  currentPrice: number;
  scores: ScoreBreakdown;
  conviction: ConvictionLevel;
  /** null when the instrument had too little history to forecast. */
  volatility: VolatilityProfile | null;
  riskCategory: RiskCategory;
  positionSizePct: number;
  assumptions: string[];
}

export interface EligibilityFailure {
  predicate: string;
  field: string;
  reason: 'missing_field' | 'below_min' | 'above_max' | 'not_above_floor';
  value: number | null;
  threshold: number;
}

export interface EligibilityVerdict {
  eligible: boolean;
  failedPredicates: string[];
  failures: EligibilityFailure[];
}

export type ForecastFailureKind = 'InvalidSeries' | 'InsufficientHistory' | 'ProcessingError';

export interface ForecastFailure {
  id: string;
  kind: ForecastFailureKind;
  message: string;
  /** InvalidSeries and ProcessingError drop the instrument; InsufficientHistory does not. */
  dropped: boolean;
}

export interface IntakeRejection {
  index: number;
  id: string | null;
  reasons: string[];
}

export interface GateRejection {
  id: string;
  sector: string;
  failedPredicates: string[];
  failures: EligibilityFailure[];
}

/** Scored, eligible instrument whose composite fell under the configured minimum. */
export interface BelowMinimumEntry {
  id: string;
  composite: number;
}

export interface RunAudit {
  intakeRejections: IntakeRejection[];
  gateRejections: GateRejection[];
  forecastFailures: ForecastFailure[];
  belowMinimum: BelowMinimumEntry[];
}

export interface RunCounts {
  received: number;
  intakeRejected: number;
  truncated: number;
  processed: number;
  eligible: number;
  rejected: number;
  forecastFailed: number;
  invalidSeries: number;
  insufficientHistory: number;
  belowMinimum: number;
  /** Qualified on score but left out once the shortlist was full. */
  notSelected: number;
  shortlisted: number;
}

export interface SelectionSummary {
  sectorLimit: number;
  deferred: string[];
  backfilled: string[];
  /** Qualifying ids past the shortlist size, in rank order. */
  notSelected: string[];
  sectorCounts: Record<string, number>;
  sectorShares: Record<string, number>;
}

export interface AllocationSummary {
  totalPct: number;
  bySectorPct: Record<string, number>;
  scaledForTotalCap: boolean;
  scaledSectors: string[];
}

export interface ScreenRunResult {
  configHash: string;
  resultHash: string;
  opportunities: RankedOpportunity[];
  audit: RunAudit;
  counts: RunCounts;
  selection: SelectionSummary;
  allocation: AllocationSummary;
}
