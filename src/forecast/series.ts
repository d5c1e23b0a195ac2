import { isValid, parseISO } from 'date-fns';
import { InsufficientHistoryError, InvalidSeriesError } from '@/core/errors';
import type { MetricBundle } from '@/types/metric_bundle';

const isPositivePrice = (value: number) => Number.isFinite(value) && value > 0;

/**
 * Fail fast on malformed history, then on short history.
 * Malformed series are checked first so a short but corrupt series is
 * reported as invalid rather than merely short.
 */
export function assertUsableSeries(bundle: MetricBundle, minHistory: number): void {
  const { id, history, currentPrice } = bundle;

  if (!isPositivePrice(currentPrice)) {
    throw new InvalidSeriesError(id, `current price ${currentPrice} is not a positive number`);
  }

  let previousTime: number | null = null;
  history.forEach((bar, index) => {
    const prices: Array<[string, number]> = [
      ['open', bar.open],
      ['high', bar.high],
      ['low', bar.low],
      ['close', bar.close],
    ];
    for (const [field, value] of prices) {
      if (!isPositivePrice(value)) {
        throw new InvalidSeriesError(id, `bar ${index} ${field} ${value} is not a positive price`);
      }
    }
    if (!Number.isFinite(bar.volume) || bar.volume < 0) {
      throw new InvalidSeriesError(id, `bar ${index} volume ${bar.volume} is negative`);
    }
    if (bar.high < bar.low) {
      throw new InvalidSeriesError(id, `bar ${index} high ${bar.high} is below low ${bar.low}`);
    }

    const timestamp = parseISO(bar.timestamp);
    if (!isValid(timestamp)) {
      throw new InvalidSeriesError(id, `bar ${index} timestamp "${bar.timestamp}" is not a date`);
    }
    const time = timestamp.getTime();
    if (previousTime !== null && time <= previousTime) {
      throw new InvalidSeriesError(
        id,
        `bar ${index} timestamp ${bar.timestamp} does not increase on the previous bar`
      );
    }
    previousTime = time;
  });

  if (history.length < minHistory) {
    throw new InsufficientHistoryError(id, history.length, minHistory);
  }
}
