/**
 * Moving averages and rolling statistics.
 *
 * Every function returns a new array aligned 1:1 with its input. Positions
 * before the window is filled hold NaN.
 */

import { ConfigurationError } from '@quantsweep/shared-utils';

/**
 * Derived numeric column aligned with a price series. NaN until warm-up elapses.
 */
export type IndicatorSeries = number[];

export function assertWindow(window: number, label: string): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new ConfigurationError(`${label} must be a positive integer (got ${window})`);
  }
}

function emptySeries(length: number): IndicatorSeries {
  return new Array<number>(length).fill(NaN);
}

/**
 * Simple moving average over a trailing window.
 */
export function sma(values: readonly number[], window: number): IndicatorSeries {
  assertWindow(window, 'SMA window');
  const out = emptySeries(values.length);
  let sum = 0;

  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= window) {
      sum -= values[i - window];
    }
    if (i >= window - 1) {
      out[i] = sum / window;
    }
  }

  return out;
}

/**
 * Exponential moving average, alpha = 2 / (span + 1).
 * Non-adjusted recursion seeded with the first value, so it is defined from index 0.
 */
export function ema(values: readonly number[], span: number): IndicatorSeries {
  if (!(span >= 1) || !Number.isFinite(span)) {
    throw new ConfigurationError(`EMA span must be >= 1 (got ${span})`);
  }
  const out = emptySeries(values.length);
  if (values.length === 0) {
    return out;
  }

  const alpha = 2 / (span + 1);
  let prev = values[0];
  out[0] = prev;
  for (let i = 1; i < values.length; i++) {
    prev = alpha * values[i] + (1 - alpha) * prev;
    out[i] = prev;
  }

  return out;
}

/**
 * Rolling sample standard deviation (n - 1 denominator). A window of 1 yields NaN.
 */
export function rollingStd(values: readonly number[], window: number): IndicatorSeries {
  assertWindow(window, 'Std window');
  const out = emptySeries(values.length);
  if (window < 2) {
    return out;
  }

  for (let i = window - 1; i < values.length; i++) {
    let mean = 0;
    for (let j = i - window + 1; j <= i; j++) {
      mean += values[j];
    }
    mean /= window;

    let squares = 0;
    for (let j = i - window + 1; j <= i; j++) {
      const diff = values[j] - mean;
      squares += diff * diff;
    }
    out[i] = Math.sqrt(squares / (window - 1));
  }

  return out;
}
