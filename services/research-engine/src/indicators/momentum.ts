import { ConfigurationError } from '@quantsweep/shared-utils';
import { IndicatorSeries, ema } from './movingAverages';

export interface MacdSeries {
  macdLine: IndicatorSeries;
  signalLine: IndicatorSeries;
  histogram: IndicatorSeries;
}

/**
 * MACD line = EMA(fast) - EMA(slow); signal = EMA(MACD, signal); histogram = MACD - signal.
 */
export function macd(values: readonly number[], fast: number, slow: number, signal: number): MacdSeries {
  if (fast >= slow) {
    throw new ConfigurationError(`MACD fast period (${fast}) must be less than slow period (${slow})`);
  }
  const fastEma = ema(values, fast);
  const slowEma = ema(values, slow);
  const macdLine = fastEma.map((value, i) => value - slowEma[i]);
  const signalLine = ema(macdLine, signal);
  const histogram = macdLine.map((value, i) => value - signalLine[i]);

  return { macdLine, signalLine, histogram };
}
