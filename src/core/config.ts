/**
 * Screener configuration: built-in defaults, config/screener.json and an
 * optional preset, merged per section and validated once at startup.
 *
 * The resulting ScreenerConfig is frozen and handed to each component
 * explicitly; nothing downstream reads configuration from ambient state.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { ConfigurationError } from './errors';
import { contentHash } from './seed';
import { createChildLogger } from '@/utils/logger';
import { validateConfigFile } from '@/validation/ajv_instance';
import type { Grade, RiskCategory, VolatilityRegime } from '@/types/opportunity';

const logger = createChildLogger('config');

export type ScoreBand = 'high' | 'mid' | 'low';

export const GRADES: readonly Grade[] = ['A+', 'A', 'A-', 'B+', 'B', 'B-', 'C', 'F'];
export const RISK_CATEGORIES: readonly RiskCategory[] = ['conservative', 'moderate', 'aggressive'];
export const REGIMES: readonly VolatilityRegime[] = ['low', 'normal', 'high'];
export const SCORE_BANDS: readonly ScoreBand[] = ['high', 'mid', 'low'];

export interface GateThresholds {
  minMarketCap: number;
  minAvgVolume: number;
  minPrice: number;
  maxPrice: number;
  minRevenueGrowth: number;
  maxDebtToEquity: number;
  minCurrentRatio: number;
  minGrossMargin: number;
  /** Altman Z style score; must be strictly above this floor. */
  minBankruptcyScore: number;
}

export interface ScoringWeights {
  innovation: number;
  growth: number;
  teamExecution: number;
  riskReward: number;
  technicalSetup: number;
}

export interface ForecastConfig {
  minHistory: number;
  lookbackWindow: number;
  /** Long window the short-term estimate is compared against for the volatility ratio. */
  longLookbackWindow: number;
  tradingPeriodsPerYear: number;
  horizonDays: number;
  atrPeriod: number;
  bandPeriod: number;
  regimePercentiles: { low: number; high: number };
  minRegimeSamples: number;
  /** Annualized decimals used when the rolling history is too short for percentiles. */
  fallbackRegimeThresholds: { low: number; high: number };
}

export type RiskCategoryTable = Record<VolatilityRegime, Record<ScoreBand, RiskCategory>>;

export interface RankingConfig {
  shortlistSize: number;
  maxSectorShare: number;
  minCompositeScore: number;
  scoreBands: { high: number; mid: number };
  riskCategoryTable: RiskCategoryTable;
}

/** Percent of capital per grade and risk category. */
export type PositionSizeTable = Record<Grade, Record<RiskCategory, number>>;

export interface SizingConfig {
  totalExposureCap: number;
  sectorCap: number;
  positionSizeTable: PositionSizeTable;
}

export interface PipelineConfig {
  maxInstruments: number | null;
}

export interface ScreenerConfig {
  gate: GateThresholds;
  weights: ScoringWeights;
  forecast: ForecastConfig;
  ranking: RankingConfig;
  sizing: SizingConfig;
  pipeline: PipelineConfig;
}

export const DEFAULT_CONFIG: ScreenerConfig = {
  gate: {
    minMarketCap: 100_000_000,
    minAvgVolume: 100_000,
    minPrice: 1,
    maxPrice: 10_000,
    minRevenueGrowth: 0.15,
    maxDebtToEquity: 2,
    minCurrentRatio: 1,
    minGrossMargin: 0.2,
    minBankruptcyScore: 1.81,
  },
  weights: {
    innovation: 0.25,
    growth: 0.25,
    teamExecution: 0.15,
    riskReward: 0.2,
    technicalSetup: 0.15,
  },
  forecast: {
    minHistory: 20,
    lookbackWindow: 20,
    longLookbackWindow: 60,
    tradingPeriodsPerYear: 252,
    horizonDays: 5,
    atrPeriod: 14,
    bandPeriod: 20,
    regimePercentiles: { low: 33, high: 67 },
    minRegimeSamples: 60,
    fallbackRegimeThresholds: { low: 0.2, high: 0.4 },
  },
  ranking: {
    shortlistSize: 20,
    maxSectorShare: 0.4,
    minCompositeScore: 0,
    scoreBands: { high: 75, mid: 60 },
    riskCategoryTable: {
      low: { high: 'conservative', mid: 'moderate', low: 'aggressive' },
      normal: { high: 'moderate', mid: 'moderate', low: 'moderate' },
      high: { high: 'aggressive', mid: 'moderate', low: 'aggressive' },
    },
  },
  sizing: {
    totalExposureCap: 80,
    sectorCap: 40,
    positionSizeTable: {
      'A+': { conservative: 15, moderate: 12, aggressive: 8 },
      A: { conservative: 12, moderate: 10, aggressive: 7 },
      'A-': { conservative: 10, moderate: 8, aggressive: 6 },
      'B+': { conservative: 8, moderate: 7, aggressive: 5 },
      B: { conservative: 7, moderate: 6, aggressive: 4 },
      'B-': { conservative: 6, moderate: 5, aggressive: 4 },
      C: { conservative: 3, moderate: 3, aggressive: 3 },
      F: { conservative: 0, moderate: 0, aggressive: 0 },
    },
  },
  pipeline: {
    maxInstruments: null,
  },
};

type Band = { low?: number; high?: number };

export interface RawConfigSection {
  gate?: {
    min_market_cap?: number;
    min_avg_volume?: number;
    min_price?: number;
    max_price?: number;
    min_revenue_growth?: number;
    max_debt_to_equity?: number;
    min_current_ratio?: number;
    min_gross_margin?: number;
    min_bankruptcy_score?: number;
  };
  weights?: {
    innovation?: number;
    growth?: number;
    team_execution?: number;
    risk_reward?: number;
    technical_setup?: number;
  };
  forecast?: {
    min_history?: number;
    lookback_window?: number;
    long_lookback_window?: number;
    trading_periods_per_year?: number;
    horizon_days?: number;
    atr_period?: number;
    band_period?: number;
    regime_percentiles?: Band;
    min_regime_samples?: number;
    fallback_regime_thresholds?: Band;
  };
  ranking?: {
    shortlist_size?: number;
    max_sector_share?: number;
    min_composite_score?: number;
    score_bands?: { high?: number; mid?: number };
    risk_category_table?: Partial<Record<VolatilityRegime, Partial<Record<ScoreBand, RiskCategory>>>>;
  };
  sizing?: {
    total_exposure_cap?: number;
    sector_cap?: number;
    position_size_table?: Partial<Record<Grade, Partial<Record<RiskCategory, number>>>>;
  };
  pipeline?: {
    max_instruments?: number | null;
  };
}

export interface RawConfigFile extends RawConfigSection {
  name?: string;
  description?: string;
  default?: RawConfigSection;
}

function mergeGate(base: GateThresholds, raw?: RawConfigSection['gate']): GateThresholds {
  if (!raw) return base;
  return {
    minMarketCap: raw.min_market_cap ?? base.minMarketCap,
    minAvgVolume: raw.min_avg_volume ?? base.minAvgVolume,
    minPrice: raw.min_price ?? base.minPrice,
    maxPrice: raw.max_price ?? base.maxPrice,
    minRevenueGrowth: raw.min_revenue_growth ?? base.minRevenueGrowth,
    maxDebtToEquity: raw.max_debt_to_equity ?? base.maxDebtToEquity,
    minCurrentRatio: raw.min_current_ratio ?? base.minCurrentRatio,
    minGrossMargin: raw.min_gross_margin ?? base.minGrossMargin,
    minBankruptcyScore: raw.min_bankruptcy_score ?? base.minBankruptcyScore,
  };
}

function mergeWeights(base: ScoringWeights, raw?: RawConfigSection['weights']): ScoringWeights {
  if (!raw) return base;
  return {
    innovation: raw.innovation ?? base.innovation,
    growth: raw.growth ?? base.growth,
    teamExecution: raw.team_execution ?? base.teamExecution,
    riskReward: raw.risk_reward ?? base.riskReward,
    technicalSetup: raw.technical_setup ?? base.technicalSetup,
  };
}

function mergeBand(base: { low: number; high: number }, raw?: Band) {
  return { low: raw?.low ?? base.low, high: raw?.high ?? base.high };
}

function mergeForecast(base: ForecastConfig, raw?: RawConfigSection['forecast']): ForecastConfig {
  if (!raw) return base;
  return {
    minHistory: raw.min_history ?? base.minHistory,
    lookbackWindow: raw.lookback_window ?? base.lookbackWindow,
    longLookbackWindow: raw.long_lookback_window ?? base.longLookbackWindow,
    tradingPeriodsPerYear: raw.trading_periods_per_year ?? base.tradingPeriodsPerYear,
    horizonDays: raw.horizon_days ?? base.horizonDays,
    atrPeriod: raw.atr_period ?? base.atrPeriod,
    bandPeriod: raw.band_period ?? base.bandPeriod,
    regimePercentiles: mergeBand(base.regimePercentiles, raw.regime_percentiles),
    minRegimeSamples: raw.min_regime_samples ?? base.minRegimeSamples,
    fallbackRegimeThresholds: mergeBand(base.fallbackRegimeThresholds, raw.fallback_regime_thresholds),
  };
}

function mergeRiskTable(
  base: RiskCategoryTable,
  raw?: NonNullable<RawConfigSection['ranking']>['risk_category_table']
): RiskCategoryTable {
  if (!raw) return base;
  return {
    low: { ...base.low, ...raw.low },
    normal: { ...base.normal, ...raw.normal },
    high: { ...base.high, ...raw.high },
  };
}

function mergeRanking(base: RankingConfig, raw?: RawConfigSection['ranking']): RankingConfig {
  if (!raw) return base;
  return {
    shortlistSize: raw.shortlist_size ?? base.shortlistSize,
    maxSectorShare: raw.max_sector_share ?? base.maxSectorShare,
    minCompositeScore: raw.min_composite_score ?? base.minCompositeScore,
    scoreBands: {
      high: raw.score_bands?.high ?? base.scoreBands.high,
      mid: raw.score_bands?.mid ?? base.scoreBands.mid,
    },
    riskCategoryTable: mergeRiskTable(base.riskCategoryTable, raw.risk_category_table),
  };
}

function mergeSizeTable(
  base: PositionSizeTable,
  raw?: NonNullable<RawConfigSection['sizing']>['position_size_table']
): PositionSizeTable {
  if (!raw) return base;
  const merged = { ...base };
  for (const grade of GRADES) {
    merged[grade] = { ...base[grade], ...raw[grade] };
  }
  return merged;
}

function mergeSizing(base: SizingConfig, raw?: RawConfigSection['sizing']): SizingConfig {
  if (!raw) return base;
  return {
    totalExposureCap: raw.total_exposure_cap ?? base.totalExposureCap,
    sectorCap: raw.sector_cap ?? base.sectorCap,
    positionSizeTable: mergeSizeTable(base.positionSizeTable, raw.position_size_table),
  };
}

function mergePipeline(base: PipelineConfig, raw?: RawConfigSection['pipeline']): PipelineConfig {
  if (!raw) return base;
  return {
    maxInstruments: raw.max_instruments === undefined ? base.maxInstruments : raw.max_instruments,
  };
}

export function mergeConfigSection(base: ScreenerConfig, raw?: RawConfigSection): ScreenerConfig {
  if (!raw) return base;
  return {
    gate: mergeGate(base.gate, raw.gate),
    weights: mergeWeights(base.weights, raw.weights),
    forecast: mergeForecast(base.forecast, raw.forecast),
    ranking: mergeRanking(base.ranking, raw.ranking),
    sizing: mergeSizing(base.sizing, raw.sizing),
    pipeline: mergePipeline(base.pipeline, raw.pipeline),
  };
}

const WEIGHT_TOLERANCE = 1e-6;

const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;

/**
 * Semantic checks the schema cannot express. Returns every issue found.
 */
export function validateScreenerConfig(config: ScreenerConfig): string[] {
  const issues: string[] = [];
  const { weights, forecast, ranking, sizing, gate, pipeline } = config;

  const weightValues = Object.entries(weights);
  for (const [name, value] of weightValues) {
    if (!Number.isFinite(value) || value < 0) {
      issues.push(`weights.${name} must be a non-negative number (got ${value})`);
    }
  }
  const weightSum = weightValues.reduce((sum, [, value]) => sum + value, 0);
  if (Math.abs(weightSum - 1) > WEIGHT_TOLERANCE) {
    issues.push(`weights must sum to 1.0 (got ${weightSum.toFixed(6)})`);
  }

  if (gate.minPrice > gate.maxPrice) {
    issues.push(`gate.minPrice ${gate.minPrice} exceeds gate.maxPrice ${gate.maxPrice}`);
  }

  const windows: Array<[string, number]> = [
    ['forecast.minHistory', forecast.minHistory],
    ['forecast.lookbackWindow', forecast.lookbackWindow],
    ['forecast.longLookbackWindow', forecast.longLookbackWindow],
    ['forecast.tradingPeriodsPerYear', forecast.tradingPeriodsPerYear],
    ['forecast.horizonDays', forecast.horizonDays],
    ['forecast.atrPeriod', forecast.atrPeriod],
    ['forecast.bandPeriod', forecast.bandPeriod],
    ['forecast.minRegimeSamples', forecast.minRegimeSamples],
  ];
  for (const [name, value] of windows) {
    if (!isPositiveInteger(value)) {
      issues.push(`${name} must be a positive integer (got ${value})`);
    }
  }
  if (forecast.minHistory < 3) {
    issues.push(`forecast.minHistory must be at least 3 (got ${forecast.minHistory})`);
  }
  if (forecast.minHistory < forecast.bandPeriod) {
    issues.push(
      `forecast.minHistory ${forecast.minHistory} is shorter than forecast.bandPeriod ${forecast.bandPeriod}`
    );
  }
  if (forecast.minHistory < forecast.atrPeriod + 1) {
    issues.push(
      `forecast.minHistory ${forecast.minHistory} must exceed forecast.atrPeriod ${forecast.atrPeriod}`
    );
  }
  if (forecast.longLookbackWindow < forecast.lookbackWindow) {
    issues.push(
      `forecast.longLookbackWindow ${forecast.longLookbackWindow} is shorter than forecast.lookbackWindow ${forecast.lookbackWindow}`
    );
  }
  const { low: pLow, high: pHigh } = forecast.regimePercentiles;
  if (!(pLow > 0 && pLow < pHigh && pHigh < 100)) {
    issues.push(`forecast.regimePercentiles must satisfy 0 < low < high < 100 (got ${pLow}/${pHigh})`);
  }
  const { low: fLow, high: fHigh } = forecast.fallbackRegimeThresholds;
  if (!(fLow > 0 && fLow < fHigh)) {
    issues.push(
      `forecast.fallbackRegimeThresholds must satisfy 0 < low < high (got ${fLow}/${fHigh})`
    );
  }

  if (!isPositiveInteger(ranking.shortlistSize)) {
    issues.push(`ranking.shortlistSize must be a positive integer (got ${ranking.shortlistSize})`);
  }
  if (!(ranking.maxSectorShare > 0 && ranking.maxSectorShare <= 1)) {
    issues.push(`ranking.maxSectorShare must be in (0, 1] (got ${ranking.maxSectorShare})`);
  }
  if (ranking.minCompositeScore < 0 || ranking.minCompositeScore > 100) {
    issues.push(`ranking.minCompositeScore must be in [0, 100] (got ${ranking.minCompositeScore})`);
  }
  const { high: bandHigh, mid: bandMid } = ranking.scoreBands;
  if (!(bandMid > 0 && bandMid < bandHigh && bandHigh <= 100)) {
    issues.push(`ranking.scoreBands must satisfy 0 < mid < high <= 100 (got ${bandMid}/${bandHigh})`);
  }
  for (const regime of REGIMES) {
    for (const band of SCORE_BANDS) {
      const category = ranking.riskCategoryTable[regime]?.[band];
      if (!category || !RISK_CATEGORIES.includes(category)) {
        issues.push(`ranking.riskCategoryTable.${regime}.${band} is missing or invalid`);
      }
    }
  }
  if (SCORE_BANDS.some((band) => ranking.riskCategoryTable.high?.[band] === 'conservative')) {
    issues.push('ranking.riskCategoryTable.high must never map to conservative');
  }

  const caps: Array<[string, number]> = [
    ['sizing.totalExposureCap', sizing.totalExposureCap],
    ['sizing.sectorCap', sizing.sectorCap],
  ];
  for (const [name, value] of caps) {
    if (!(value > 0 && value <= 100)) {
      issues.push(`${name} must be in (0, 100] (got ${value})`);
    }
  }
  if (sizing.sectorCap > sizing.totalExposureCap) {
    issues.push(
      `sizing.sectorCap ${sizing.sectorCap} exceeds sizing.totalExposureCap ${sizing.totalExposureCap}`
    );
  }
  for (const grade of GRADES) {
    for (const category of RISK_CATEGORIES) {
      const size = sizing.positionSizeTable[grade]?.[category];
      if (size === undefined || !Number.isFinite(size) || size < 0 || size > 100) {
        issues.push(`sizing.positionSizeTable.${grade}.${category} must be in [0, 100]`);
      }
    }
  }

  if (pipeline.maxInstruments !== null && !isPositiveInteger(pipeline.maxInstruments)) {
    issues.push(`pipeline.maxInstruments must be a positive integer or null (got ${pipeline.maxInstruments})`);
  }

  return issues;
}

export function assertValidConfig(config: ScreenerConfig): void {
  const issues = validateScreenerConfig(config);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Merge and validate an in-memory override on top of the defaults.
 */
export function buildConfig(...sections: Array<RawConfigSection | undefined>): ScreenerConfig {
  const merged = sections.reduce<ScreenerConfig>(
    (config, section) => mergeConfigSection(config, section),
    structuredClone(DEFAULT_CONFIG)
  );
  assertValidConfig(merged);
  return deepFreeze(merged);
}

export interface LoadConfigOptions {
  projectRoot?: string;
  configPath?: string;
  presetName?: string;
}

export interface LoadedConfig {
  config: ScreenerConfig;
  hash: string;
  preset: string | null;
  sources: string[];
}

function readConfigFile(path: string): RawConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    throw new ConfigurationError([`config_invalid_json: ${path}`]);
  }

  const result = validateConfigFile(parsed);
  if (!result.valid) {
    throw new ConfigurationError(result.errors.map((error) => `${path} ${error}`));
  }
  return result.data;
}

function resolveConfigPath(projectRoot: string, configPath?: string): string {
  const candidate = configPath || process.env.SCREENER_CONFIG;
  if (!candidate) return join(projectRoot, 'config', 'screener.json');
  return isAbsolute(candidate) ? candidate : join(projectRoot, candidate);
}

export function loadScreenerConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const projectRoot = options.projectRoot ?? process.cwd();
  const sources: string[] = [];

  const configPath = resolveConfigPath(projectRoot, options.configPath);
  let base: RawConfigSection | undefined;
  if (existsSync(configPath)) {
    base = readConfigFile(configPath).default;
    sources.push(configPath);
  } else if (options.configPath || process.env.SCREENER_CONFIG) {
    throw new ConfigurationError([`config_not_found: ${configPath}`]);
  }

  const presetName = (options.presetName || process.env.SCREENER_PRESET || '').trim() || null;
  let preset: RawConfigSection | undefined;
  if (presetName) {
    const presetPath = join(projectRoot, 'config', 'presets', `${presetName}.json`);
    if (!existsSync(presetPath)) {
      throw new ConfigurationError([`preset_not_found: ${presetPath}`]);
    }
    preset = readConfigFile(presetPath);
    sources.push(presetPath);
  }

  const config = buildConfig(base, preset);
  const hash = contentHash(config);
  logger.info({ preset: presetName, sources, hash }, 'Screener config loaded');

  return { config, hash, preset: presetName, sources };
}

let cachedConfig: LoadedConfig | null = null;

export function getConfig(): LoadedConfig {
  if (!cachedConfig) {
    cachedConfig = loadScreenerConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
