/**
 * Validation boundary for incoming records. Schema failures and repeated
 * identifiers are rejected here and never reach the pipeline.
 */

import type { MetricBundle } from '@/types/metric_bundle';
import type { IntakeRejection } from '@/types/opportunity';
import { createChildLogger } from '@/utils/logger';
import { validateMetricBundle } from '@/validation/ajv_instance';

const logger = createChildLogger('intake');

export const UNKNOWN_SECTOR = 'Unknown';

export interface IntakeResult {
  accepted: MetricBundle[];
  rejections: IntakeRejection[];
}

export function normalizeId(id: string): string {
  return id.trim().toUpperCase();
}

function recordId(record: unknown): string | null {
  if (typeof record !== 'object' || record === null || !('id' in record)) return null;
  return typeof record.id === 'string' ? normalizeId(record.id) || null : null;
}

export function intakeRecords(records: readonly unknown[]): IntakeResult {
  const accepted: MetricBundle[] = [];
  const rejections: IntakeRejection[] = [];
  const seen = new Set<string>();

  records.forEach((record, index) => {
    const result = validateMetricBundle(record);
    if (!result.valid) {
      rejections.push({ index, id: recordId(record), reasons: result.errors });
      return;
    }

    const id = normalizeId(result.data.id);
    if (seen.has(id)) {
      rejections.push({ index, id, reasons: [`duplicate id ${id}`] });
      return;
    }
    seen.add(id);

    accepted.push({
      ...result.data,
      id,
      sector: result.data.sector.trim() || UNKNOWN_SECTOR,
    });
  });

  for (const rejection of rejections) {
    logger.warn(rejection, 'Record rejected at intake');
  }

  return { accepted, rejections };
}

export function applyInstrumentLimit<T>(
  bundles: T[],
  maxInstruments: number | null
): { bundlesToProcess: T[]; truncated: number } {
  if (!maxInstruments || maxInstruments <= 0 || bundles.length <= maxInstruments) {
    return { bundlesToProcess: bundles, truncated: 0 };
  }
  return {
    bundlesToProcess: bundles.slice(0, maxInstruments),
    truncated: bundles.length - maxInstruments,
  };
}
