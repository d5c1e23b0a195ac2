/**
 * One screening run: intake, then per instrument forecast and gate, then
 * scoring, ranking and sizing over the collected batch.
 *
 * Per-instrument failures are isolated and recorded in the audit; only a
 * ConfigurationError aborts, and it does so before any instrument is touched.
 */

import { assertValidConfig, type ScreenerConfig } from '@/core/config';
import { InsufficientHistoryError, InvalidSeriesError } from '@/core/errors';
import { contentHash } from '@/core/seed';
import { ForecastModel } from '@/forecast/forecast_model';
import { Ranker, type ScoredCandidate } from '@/ranking/ranker';
import { buildSectorContext, CompositeScorer } from '@/scoring/composite';
import { QualityGate } from '@/screening/quality_gate';
import { PositionSizer } from '@/sizing/position_sizer';
import type { MetricBundle } from '@/types/metric_bundle';
import type {
  ForecastFailure,
  GateRejection,
  RunCounts,
  ScreenRunResult,
  VolatilityProfile,
} from '@/types/opportunity';
import { createChildLogger } from '@/utils/logger';
import { applyInstrumentLimit, intakeRecords } from './intake';

const logger = createChildLogger('pipeline');

interface GatedInstrument {
  bundle: MetricBundle;
  volatility: VolatilityProfile | null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toForecastFailure(id: string, error: unknown): ForecastFailure {
  if (error instanceof InsufficientHistoryError) {
    return { id, kind: 'InsufficientHistory', message: error.message, dropped: false };
  }
  if (error instanceof InvalidSeriesError) {
    return { id, kind: 'InvalidSeries', message: error.message, dropped: true };
  }
  return { id, kind: 'ProcessingError', message: describeError(error), dropped: true };
}

export function runScreen(records: readonly unknown[], config: ScreenerConfig): ScreenRunResult {
  assertValidConfig(config);

  const forecastModel = new ForecastModel(config.forecast);
  const gate = new QualityGate(config.gate);
  const scorer = new CompositeScorer(config.weights);
  const ranker = new Ranker(config.ranking);
  const sizer = new PositionSizer(config.sizing);

  const intake = intakeRecords(records);
  const { bundlesToProcess, truncated } = applyInstrumentLimit(
    intake.accepted,
    config.pipeline.maxInstruments
  );
  if (truncated > 0) {
    logger.warn(
      { maxInstruments: config.pipeline.maxInstruments, truncated },
      'Instrument limit applied'
    );
  }

  const forecastFailures: ForecastFailure[] = [];
  const gateRejections: GateRejection[] = [];
  const gated: GatedInstrument[] = [];

  for (const bundle of bundlesToProcess) {
    let volatility: VolatilityProfile | null = null;
    try {
      volatility = forecastModel.profile(bundle);
    } catch (error) {
      const failure = toForecastFailure(bundle.id, error);
      forecastFailures.push(failure);
      logger.warn(failure, 'Forecast failed');
      if (failure.dropped) continue;
    }

    try {
      const verdict = gate.evaluate(bundle);
      if (!verdict.eligible) {
        gateRejections.push({
          id: bundle.id,
          sector: bundle.sector,
          failedPredicates: verdict.failedPredicates,
          failures: verdict.failures,
        });
        logger.debug(
          { id: bundle.id, failedPredicates: verdict.failedPredicates },
          'Rejected by quality gate'
        );
        continue;
      }
      gated.push({ bundle, volatility });
    } catch (error) {
      const failure = toForecastFailure(bundle.id, error);
      forecastFailures.push(failure);
      logger.warn(failure, 'Instrument processing failed');
    }
  }

  if (bundlesToProcess.length > 0 && gateRejections.length === bundlesToProcess.length) {
    logger.warn({ thresholds: config.gate }, 'All instruments rejected by quality gate');
  }

  const sectorContext = buildSectorContext(gated.map((g) => g.bundle));
  const candidates: ScoredCandidate[] = [];
  for (const { bundle, volatility } of gated) {
    try {
      const scored = scorer.score(bundle, sectorContext);
      candidates.push({
        id: bundle.id,
        sector: bundle.sector,
        currentPrice: bundle.currentPrice,
        scores: scored.scores,
        conviction: scored.conviction,
        assumptions: scored.assumptions,
        volatility,
      });
    } catch (error) {
      const failure = toForecastFailure(bundle.id, error);
      forecastFailures.push(failure);
      logger.warn(failure, 'Instrument scoring failed');
    }
  }

  const ranking = ranker.rank(candidates);
  if (ranking.belowMinimum.length > 0) {
    logger.info(
      { minCompositeScore: config.ranking.minCompositeScore, belowMinimum: ranking.belowMinimum },
      'Candidates under the minimum composite score'
    );
  }
  const sizing = sizer.size(ranking.opportunities);

  const byKind = (kind: ForecastFailure['kind']) =>
    forecastFailures.filter((f) => f.kind === kind).length;

  const counts: RunCounts = {
    received: records.length,
    intakeRejected: intake.rejections.length,
    truncated,
    processed: bundlesToProcess.length,
    eligible: candidates.length,
    rejected: gateRejections.length,
    forecastFailed: forecastFailures.length,
    invalidSeries: byKind('InvalidSeries'),
    insufficientHistory: byKind('InsufficientHistory'),
    belowMinimum: ranking.belowMinimum.length,
    notSelected: ranking.selection.notSelected.length,
    shortlisted: sizing.opportunities.length,
  };

  const body = {
    opportunities: sizing.opportunities,
    audit: {
      intakeRejections: intake.rejections,
      gateRejections,
      forecastFailures,
      belowMinimum: ranking.belowMinimum,
    },
    counts,
    selection: ranking.selection,
    allocation: sizing.allocation,
  };

  const result: ScreenRunResult = {
    configHash: contentHash(config),
    resultHash: contentHash(body),
    ...body,
  };

  logger.info({ counts, resultHash: result.resultHash }, 'Screen run complete');
  return result;
}
