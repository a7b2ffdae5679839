import { PriceBar, PriceSeries } from '@quantsweep/shared-types';
import { DataError } from '@quantsweep/shared-utils';

const OHLCV_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;

/**
 * Check a series against the collaborator contract: finite OHLCV fields,
 * strictly increasing timestamps.
 */
export function assertPriceSeries(series: PriceSeries, label: string = 'price series'): void {
  let prevTimestamp = -Infinity;

  series.forEach((bar, index) => {
    if (!Number.isFinite(bar.timestamp)) {
      throw new DataError(`${label}: bar ${index} has no valid timestamp`);
    }
    for (const field of OHLCV_FIELDS) {
      if (!Number.isFinite(bar[field])) {
        throw new DataError(`${label}: bar ${index} (${new Date(bar.timestamp).toISOString()}) is missing ${field}`);
      }
    }
    if (bar.timestamp <= prevTimestamp) {
      throw new DataError(
        `${label}: timestamps must be strictly increasing (bar ${index} at ${new Date(bar.timestamp).toISOString()})`
      );
    }
    prevTimestamp = bar.timestamp;
  });
}

/**
 * A candle is plausible when high >= max(open, close) and low <= min(open, close).
 */
export function isPlausibleBar(bar: PriceBar): boolean {
  return (
    OHLCV_FIELDS.every((field) => Number.isFinite(bar[field])) &&
    bar.high >= bar.low &&
    bar.open >= bar.low &&
    bar.open <= bar.high &&
    bar.close >= bar.low &&
    bar.close <= bar.high
  );
}

/**
 * Sort ascending and keep the last bar seen for any repeated timestamp.
 */
export function normalizeBars(bars: readonly PriceBar[]): PriceBar[] {
  const byTimestamp = new Map<number, PriceBar>();
  for (const bar of bars) {
    byTimestamp.set(bar.timestamp, bar);
  }
  return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
}

export function sliceByTime(series: PriceSeries, start: number, end: number): PriceBar[] {
  return series.filter((bar) => bar.timestamp >= start && bar.timestamp <= end);
}
