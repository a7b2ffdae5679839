/**
 * ADX / DMI with Wilder smoothing.
 *
 * Two smoothing stages: true range and directional movement are smoothed
 * first, then the resulting DX is smoothed again into ADX. Both stages are a
 * running accumulator, so each value depends on the previous one.
 */

import { PriceBar } from '@quantsweep/shared-types';
import { IndicatorSeries, assertWindow } from './movingAverages';

/**
 * Wilder's smoothing starting at `start`: seeded with the mean of the first
 * `period` values, then s[t] = (s[t-1] * (period - 1) + x[t]) / period.
 * Output before `start + period - 1` is NaN.
 */
export function wilderSmooth(values: readonly number[], period: number, start: number = 0): IndicatorSeries {
  assertWindow(period, 'Wilder period');
  const out = new Array<number>(values.length).fill(NaN);
  const seedIndex = start + period - 1;
  if (start < 0 || seedIndex >= values.length) {
    return out;
  }

  let acc = 0;
  for (let i = start; i <= seedIndex; i++) {
    acc += values[i];
  }
  let prev = acc / period;
  out[seedIndex] = prev;

  for (let i = seedIndex + 1; i < values.length; i++) {
    prev = (prev * (period - 1) + values[i]) / period;
    out[i] = prev;
  }

  return out;
}

export interface DirectionalIndex {
  plusDi: IndicatorSeries;
  minusDi: IndicatorSeries;
  dx: IndicatorSeries;
  adx: IndicatorSeries;
}

function clip(value: number): number {
  return Math.min(100, Math.max(0, value));
}

/**
 * +DI / -DI are valid from index `period`, ADX from index `2 * period - 1`.
 */
export function directionalMovement(bars: readonly PriceBar[], period: number): DirectionalIndex {
  assertWindow(period, 'ADX window');
  const n = bars.length;
  const tr = new Array<number>(n).fill(NaN);
  const plusDm = new Array<number>(n).fill(NaN);
  const minusDm = new Array<number>(n).fill(NaN);

  for (let i = 1; i < n; i++) {
    const bar = bars[i];
    const prev = bars[i - 1];
    const upMove = bar.high - prev.high;
    const downMove = prev.low - bar.low;

    tr[i] = Math.max(bar.high - bar.low, Math.abs(bar.high - prev.close), Math.abs(bar.low - prev.close));
    plusDm[i] = upMove > downMove && upMove > 0 ? upMove : 0;
    minusDm[i] = downMove > upMove && downMove > 0 ? downMove : 0;
  }

  const smoothedTr = wilderSmooth(tr, period, 1);
  const smoothedPlus = wilderSmooth(plusDm, period, 1);
  const smoothedMinus = wilderSmooth(minusDm, period, 1);

  const plusDi = new Array<number>(n).fill(NaN);
  const minusDi = new Array<number>(n).fill(NaN);
  const dx = new Array<number>(n).fill(NaN);

  for (let i = period; i < n; i++) {
    const range = smoothedTr[i];
    const pdi = range === 0 ? 0 : clip((100 * smoothedPlus[i]) / range);
    const mdi = range === 0 ? 0 : clip((100 * smoothedMinus[i]) / range);
    const diSum = pdi + mdi;

    plusDi[i] = pdi;
    minusDi[i] = mdi;
    dx[i] = diSum === 0 ? 0 : clip((100 * Math.abs(pdi - mdi)) / diSum);
  }

  const adx = wilderSmooth(dx, period, period).map((value) => (Number.isNaN(value) ? value : clip(value)));

  return { plusDi, minusDi, dx, adx };
}
