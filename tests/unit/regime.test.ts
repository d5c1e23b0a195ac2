import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '@/core/config';
import { classifyRegime, volatilityScore } from '@/forecast/regime';

const config = DEFAULT_CONFIG.forecast;

describe('classifyRegime', () => {
  it('falls back to fixed thresholds when the history is short', () => {
    const short = [0.25, 0.3];
    expect(classifyRegime(0.1, short, config)).toEqual({
      regime: 'low',
      method: 'fixed_threshold',
      thresholds: { low: 0.2, high: 0.4 },
    });
    expect(classifyRegime(0.3, short, config).regime).toBe('normal');
    expect(classifyRegime(0.5, short, config).regime).toBe('high');
  });

  it('uses percentiles of the instrument history once enough samples exist', () => {
    const history = Array.from({ length: 100 }, (_, i) => (i + 1) / 100);
    const result = classifyRegime(0.2, history, config);

    expect(result.method).toBe('percentile');
    expect(result.regime).toBe('low');
    expect(result.thresholds.low).toBeCloseTo(0.3367, 10);
    expect(result.thresholds.high).toBeCloseTo(0.6733, 10);
    expect(classifyRegime(0.5, history, config).regime).toBe('normal');
    expect(classifyRegime(0.9, history, config).regime).toBe('high');
  });

  it('switches method exactly at the sample minimum', () => {
    const history = Array.from({ length: config.minRegimeSamples }, () => 0.3);
    expect(classifyRegime(0.3, history, config).method).toBe('percentile');
    expect(classifyRegime(0.3, history.slice(1), config).method).toBe('fixed_threshold');
  });
});

describe('volatilityScore', () => {
  it('rewards moderate, stable volatility', () => {
    expect(volatilityScore(0.3, 1)).toBe(80);
    expect(volatilityScore(0.17, 1.3)).toBe(65);
  });

  it('penalizes extreme and expanding volatility', () => {
    expect(volatilityScore(0.7, 2.5)).toBe(25);
    expect(volatilityScore(0.55, 1.7)).toBe(50);
    expect(volatilityScore(0.05, 0.5)).toBe(50);
  });
});
