import { PriceBar } from '@quantsweep/shared-types';
import { IndicatorSeries, assertWindow, rollingStd, sma } from './movingAverages';

/**
 * True range: max(high - low, |high - prevClose|, |low - prevClose|).
 * The first bar has no previous close and uses high - low.
 */
export function trueRange(bars: readonly PriceBar[]): IndicatorSeries {
  return bars.map((bar, i) => {
    const range = bar.high - bar.low;
    if (i === 0) {
      return range;
    }
    const prevClose = bars[i - 1].close;
    return Math.max(range, Math.abs(bar.high - prevClose), Math.abs(bar.low - prevClose));
  });
}

/**
 * Average True Range as a rolling mean of true range.
 */
export function atr(bars: readonly PriceBar[], window: number): IndicatorSeries {
  assertWindow(window, 'ATR window');
  return sma(trueRange(bars), window);
}

export interface BollingerBands {
  middle: IndicatorSeries;
  upper: IndicatorSeries;
  lower: IndicatorSeries;
  std: IndicatorSeries;
}

export function bollingerBands(values: readonly number[], window: number, stdDev: number): BollingerBands {
  const middle = sma(values, window);
  const std = rollingStd(values, window);
  const upper = middle.map((m, i) => m + stdDev * std[i]);
  const lower = middle.map((m, i) => m - stdDev * std[i]);
  return { middle, upper, lower, std };
}
