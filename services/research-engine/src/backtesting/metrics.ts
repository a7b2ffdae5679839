/**
 * Backtest metrics: period returns, annualized Sharpe, max drawdown.
 */

import { periodsPerYear } from '../indicators';
import { BacktestMetrics } from './types';

/**
 * Consecutive changes of an equity multiplier curve, measured from a 1.0 baseline.
 */
export function periodReturns(equityCurve: readonly number[]): number[] {
  let prev = 1;
  return equityCurve.map((equity) => {
    const change = equity / prev - 1;
    prev = equity;
    return change;
  });
}

/**
 * mean / population std * sqrt(periodsPerYear). Flat returns give 0.
 */
export function sharpeRatio(returns: readonly number[], periodsPerYearValue: number): number {
  if (returns.length === 0) {
    return 0;
  }
  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) * (r - mean), 0) / returns.length;
  const std = Math.sqrt(variance);
  if (std === 0 || !Number.isFinite(std)) {
    return 0;
  }
  return (mean / std) * Math.sqrt(periodsPerYearValue);
}

/**
 * Minimum of equity / runningPeak - 1. Zero or negative.
 */
export function maxDrawdown(equityCurve: readonly number[]): number {
  let peak = 1;
  let worst = 0;
  for (const equity of equityCurve) {
    peak = Math.max(peak, equity);
    worst = Math.min(worst, equity / peak - 1);
  }
  return worst;
}

export function computeMetrics(equityCurve: number[], tradeCount: number, timeframe: string): BacktestMetrics {
  const annualization = periodsPerYear(timeframe);
  if (tradeCount === 0) {
    return { totalReturn: 0, sharpeRatio: 0, maxDrawdown: 0, equityCurve, tradeCount };
  }

  const finalEquity = equityCurve.length > 0 ? equityCurve[equityCurve.length - 1] : 1;
  return {
    totalReturn: finalEquity - 1,
    sharpeRatio: sharpeRatio(periodReturns(equityCurve), annualization),
    maxDrawdown: maxDrawdown(equityCurve),
    equityCurve,
    tradeCount,
  };
}
