import { describe, it, expect } from 'vitest';
import {
  atrPercent,
  bandWidthPercent,
  dailyReturnVolatility,
  movingAverageDrift,
  parkinsonVolatility,
  realizedVolatility,
  rollingVolatilityHistory,
  trueRanges,
  volatilityRatio,
} from '@/forecast/estimators';
import type { PriceBar } from '@/types/metric_bundle';

function bar(high: number, low: number, close: number, day = 1): PriceBar {
  return {
    timestamp: `2026-02-${String(day).padStart(2, '0')}`,
    open: close,
    high,
    low,
    close,
    volume: 1000,
  };
}

describe('realizedVolatility', () => {
  it('annualizes the sample deviation of log returns', () => {
    const a = Math.log(1.01);
    const closes = [100, 101, 100, 101, 100];
    // returns alternate +a / -a, so the mean is 0 and the variance 4a^2 / 3
    expect(realizedVolatility(closes, 20, 252)).toBeCloseTo(
      a * Math.sqrt(4 / 3) * Math.sqrt(252),
      12
    );
  });

  it('only looks at the trailing window of returns', () => {
    expect(dailyReturnVolatility([100, 200, 200, 200, 200], 2)).toBe(0);
    expect(dailyReturnVolatility([100, 200, 200, 200, 200], 4)).toBeGreaterThan(0);
  });
});

describe('volatilityRatio', () => {
  it('compares the short window against the long window', () => {
    const closes = Array.from({ length: 61 }, (_, i) => (i % 2 === 0 ? 100 : 101));
    // 20 and 60 alternating returns: variances 20a^2 / 19 and 60a^2 / 59
    expect(volatilityRatio(closes, 20, 60)).toBeCloseTo(Math.sqrt(59 / 57), 10);
  });

  it('is neutral when the long estimate is zero', () => {
    expect(volatilityRatio([100, 100, 100, 100], 2, 3)).toBe(1);
  });
});

describe('parkinsonVolatility', () => {
  it('scales the mean squared log range', () => {
    const bars = [1, 2, 3].map((day) => bar(100 * Math.exp(0.01), 100 * Math.exp(-0.01), 100, day));
    expect(parkinsonVolatility(bars, 20, 252)).toBeCloseTo(
      (0.02 / Math.sqrt(4 * Math.LN2)) * Math.sqrt(252),
      10
    );
  });

  it('is zero without bars', () => {
    expect(parkinsonVolatility([], 20, 252)).toBe(0);
  });
});

describe('average true range', () => {
  const bars = [bar(10, 8, 9, 1), bar(12, 9.5, 11, 2), bar(10, 9, 9.5, 3)];

  it('includes gaps from the previous close', () => {
    expect(trueRanges(bars)).toEqual([2, 3, 2]);
  });

  it('reports the mean of the last period ranges as a percent of price', () => {
    expect(atrPercent(bars, 2, 10)).toBe(25);
  });
});

describe('bandWidthPercent', () => {
  it('is four deviations over the moving average', () => {
    expect(bandWidthPercent([9, 11], 20)).toBeCloseTo((4 * Math.SQRT2 * 100) / 10, 10);
  });

  it('is zero for a flat series', () => {
    expect(bandWidthPercent([10, 10, 10, 10], 4)).toBe(0);
  });
});

describe('rollingVolatilityHistory', () => {
  it('produces one estimate per complete window, ending at the current one', () => {
    const closes = [100, 102, 101, 104, 103, 107];
    const history = rollingVolatilityHistory(closes, 2, 1);
    expect(history).toHaveLength(4);
    expect(history[3]).toBeCloseTo(dailyReturnVolatility(closes, 2), 12);
  });

  it('is empty when the series is shorter than the window', () => {
    expect(rollingVolatilityHistory([100, 101, 102], 20, 252)).toEqual([]);
  });
});

describe('movingAverageDrift', () => {
  it('measures the relative slope of the average across the horizon', () => {
    const closes = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
    // averages of two: 1.5 ... 9.5, compared four steps back
    expect(movingAverageDrift(closes, 2, 5)).toBeCloseTo((9.5 - 5.5) / 5.5, 12);
  });

  it('is zero without enough averages', () => {
    expect(movingAverageDrift([1, 2, 3], 2, 5)).toBe(0);
  });
});
