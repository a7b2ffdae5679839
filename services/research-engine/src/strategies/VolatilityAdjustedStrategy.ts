/**
 * VolatilityAdjustedStrategy - EMA crossover with ATR displacement check and ATR stops
 *
 * BUY  : golden cross AND |close - close[t - volatilityLookback]| >= ATR
 * SELL : death cross
 * Stop-loss sits atrMultiplier ATRs beyond the entry close.
 */

import { EntryDirection, PriceSeries, SignalValue } from '@quantsweep/shared-types';
import { ConfigurationError } from '@quantsweep/shared-utils';
import { assertWindow, atr, ema } from '../indicators';
import { BaseStrategy, detectCrossovers } from './BaseStrategy';
import { IndicatorFrame, ProtectiveLevels, StrategyOptions, VolatilityAdjustedSpec } from './types';

type VolatilityColumns = 'emaFast' | 'emaSlow' | 'atr';

export const DEFAULT_VOLATILITY_LOOKBACK = 5;

export class VolatilityAdjustedStrategy extends BaseStrategy<VolatilityColumns> {
  readonly kind = 'volatility_adjusted' as const;
  readonly fastWindow: number;
  readonly slowWindow: number;
  readonly atrWindow: number;
  readonly atrMultiplier: number;
  readonly volatilityLookback: number;
  readonly riskRewardRatio?: number;

  constructor(spec: Omit<VolatilityAdjustedSpec, 'kind'>, options: StrategyOptions = {}) {
    super(
      `VolatilityAdjusted(${spec.fastWindow}/${spec.slowWindow}, ATR ${spec.atrWindow}x${spec.atrMultiplier})`,
      options
    );
    assertWindow(spec.fastWindow, 'fastWindow');
    assertWindow(spec.slowWindow, 'slowWindow');
    assertWindow(spec.atrWindow, 'atrWindow');
    if (spec.fastWindow >= spec.slowWindow) {
      throw new ConfigurationError(
        `fastWindow (${spec.fastWindow}) must be less than slowWindow (${spec.slowWindow})`
      );
    }
    if (!(spec.atrMultiplier > 0)) {
      throw new ConfigurationError(`atrMultiplier must be positive (got ${spec.atrMultiplier})`);
    }
    const lookback = spec.volatilityLookback ?? DEFAULT_VOLATILITY_LOOKBACK;
    assertWindow(lookback, 'volatilityLookback');
    if (spec.riskRewardRatio !== undefined && !(spec.riskRewardRatio > 0)) {
      throw new ConfigurationError(`riskRewardRatio must be positive (got ${spec.riskRewardRatio})`);
    }

    this.fastWindow = spec.fastWindow;
    this.slowWindow = spec.slowWindow;
    this.atrWindow = spec.atrWindow;
    this.atrMultiplier = spec.atrMultiplier;
    this.volatilityLookback = lookback;
    this.riskRewardRatio = spec.riskRewardRatio;
  }

  protected get ownLookbackPeriod(): number {
    return Math.max(this.slowWindow, this.atrWindow, this.volatilityLookback);
  }

  calculateIndicators(series: PriceSeries): IndicatorFrame<VolatilityColumns> {
    const closes = series.map((bar) => bar.close);
    return {
      length: series.length,
      columns: {
        emaFast: ema(closes, this.fastWindow),
        emaSlow: ema(closes, this.slowWindow),
        atr: atr(series, this.atrWindow),
      },
    };
  }

  protected computeTriggers(series: PriceSeries, frame: IndicatorFrame<VolatilityColumns>): SignalValue[] {
    const crosses = detectCrossovers(frame.columns.emaFast, frame.columns.emaSlow);
    const range = frame.columns.atr;

    return crosses.map((cross, i): SignalValue => {
      if (cross !== 'BUY') return cross;
      if (i < this.volatilityLookback) return 'NEUTRAL';
      const displacement = Math.abs(series[i].close - series[i - this.volatilityLookback].close);
      return displacement >= range[i] ? 'BUY' : 'NEUTRAL';
    });
  }

  protected protectiveLevels(
    frame: IndicatorFrame<VolatilityColumns>,
    index: number,
    direction: EntryDirection,
    entryPrice: number
  ): ProtectiveLevels {
    const range = frame.columns.atr[index];
    if (!Number.isFinite(range)) {
      return {};
    }
    const distance = range * this.atrMultiplier;
    const sign = direction === 'BUY' ? 1 : -1;
    const levels: ProtectiveLevels = { stopLossPrice: entryPrice - sign * distance };
    if (this.riskRewardRatio !== undefined) {
      levels.takeProfitPrice = entryPrice + sign * distance * this.riskRewardRatio;
    }
    return levels;
  }
}
