/**
 * Ajv validation instance with schema validators
 * Input records and config files must validate before they are used
 */

import Ajv, { type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { MetricBundle } from '@/types/metric_bundle';
import type { RawConfigFile } from '@/core/config';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// date / date-time formats for bar timestamps
addFormats(ajv);

// Lazy-loaded validators
let metricBundleValidator: ValidateFunction<MetricBundle> | null = null;
let configFileValidator: ValidateFunction<RawConfigFile> | null = null;

export function getMetricBundleValidator(): ValidateFunction<MetricBundle> {
  if (!metricBundleValidator) {
    metricBundleValidator = ajv.compile<MetricBundle>(loadSchema('metric_bundle.v1'));
  }
  return metricBundleValidator;
}

export function getConfigFileValidator(): ValidateFunction<RawConfigFile> {
  if (!configFileValidator) {
    configFileValidator = ajv.compile<RawConfigFile>(loadSchema('screener_config.v1'));
  }
  return configFileValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message ?? 'invalid'}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateMetricBundle(data: unknown): ValidationResult<MetricBundle> {
  return runValidator(getMetricBundleValidator(), data);
}

export function validateConfigFile(data: unknown): ValidationResult<RawConfigFile> {
  return runValidator(getConfigFileValidator(), data);
}
