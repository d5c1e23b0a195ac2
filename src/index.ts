export { runScreen } from './pipeline/run_screen';
export { intakeRecords } from './pipeline/intake';
export {
  buildConfig,
  DEFAULT_CONFIG,
  getConfig,
  loadScreenerConfig,
  resetConfig,
  validateScreenerConfig,
} from './core/config';
export type { LoadedConfig, ScreenerConfig } from './core/config';
export {
  ConfigurationError,
  InsufficientHistoryError,
  InvalidSeriesError,
  ScreenerError,
} from './core/errors';
export { ForecastModel, buildVolatilityProfile } from './forecast/forecast_model';
export { QualityGate, evaluateEligibility } from './screening/quality_gate';
export { CompositeScorer, computeCompositeScore } from './scoring/composite';
export { Ranker, rankCandidates } from './ranking/ranker';
export { PositionSizer, sizePositions } from './sizing/position_sizer';
export { checkRunConsistency } from './run/validator';
export { formatRunSummary } from './run/summary';
export { writeRunResult } from './run/writer';
export type * from './types/metric_bundle';
export type * from './types/opportunity';
