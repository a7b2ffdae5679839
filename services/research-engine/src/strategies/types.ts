/**
 * Strategy Types
 *
 * A strategy is a signal pipeline: it owns its indicator calculation, its raw
 * entry triggers, and the optional regime and momentum gates injected at
 * construction.
 */

import { PriceSeries, SignalValue } from '@quantsweep/shared-types';
import { EntryFilter, MomentumFilterConfig, RegimeFilterConfig } from '../filters';
import { IndicatorSeries } from '../indicators';

/**
 * Derived columns aligned 1:1 with the price series. Rebuilt from scratch per parameter set.
 */
export interface IndicatorFrame<K extends string = string> {
  length: number;
  columns: Record<K, IndicatorSeries>;
}

export interface Signal {
  value: SignalValue; // final entry decision after gates and long-only rewrite
  trigger: SignalValue; // raw strategy trigger, never gated; drives strategy exits
  stopLossPrice?: number;
  takeProfitPrice?: number;
}

export interface ProtectiveLevels {
  stopLossPrice?: number;
  takeProfitPrice?: number;
}

export interface SignalPipeline<K extends string = string> {
  readonly name: string;
  readonly maxLookbackPeriod: number;
  calculateIndicators(series: PriceSeries): IndicatorFrame<K>;
  generateSignals(series: PriceSeries, indicators: IndicatorFrame<K>): Signal[];
}

export interface StrategyOptions {
  regimeFilter?: EntryFilter;
  momentumFilter?: EntryFilter;
  longOnly?: boolean; // rewrite SELL entries to NEUTRAL after gating
}

export interface SmaCrossSpec {
  kind: 'sma_cross';
  fastWindow: number;
  slowWindow: number;
}

export interface VolatilityAdjustedSpec {
  kind: 'volatility_adjusted';
  fastWindow: number; // EMA span
  slowWindow: number; // EMA span
  atrWindow: number;
  atrMultiplier: number; // stop distance in ATRs
  volatilityLookback?: number; // bars for the displacement check, default 5
  riskRewardRatio?: number; // when set, take-profit = stop distance * ratio
}

export interface BollingerBandSpec {
  kind: 'bollinger_band';
  bbWindow: number;
  bbStdDev: number;
  atrWindow?: number; // optional ATR-based stops
  atrMultiplier?: number;
}

export type StrategySpec = SmaCrossSpec | VolatilityAdjustedSpec | BollingerBandSpec;

/**
 * Everything needed to rebuild a pipeline and its engine-side exit rule.
 */
export interface StrategyConfig {
  strategy: StrategySpec;
  regimeFilter?: RegimeFilterConfig;
  momentumFilter?: MomentumFilterConfig;
  maxHoldHours?: number;
  longOnly?: boolean;
}
