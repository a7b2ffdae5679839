import { EntryDirection, MarketRegime, PriceSeries } from '@quantsweep/shared-types';

/**
 * Entry quality gate. One boolean per bar: may an entry in `direction` be taken here?
 * Only entries are gated; exits never pass through a filter.
 */
export interface EntryFilter {
  readonly name: string;
  readonly maxLookbackPeriod: number;
  evaluate(series: PriceSeries, direction: EntryDirection): boolean[];
}

export interface RegimeFilter extends EntryFilter {
  classify(series: PriceSeries): MarketRegime[];
}

export interface MomentumFilter extends EntryFilter {
  histogram(series: PriceSeries): number[];
}

/**
 * How a regime gate reads "matches the intended direction".
 * - trend_following: BUY only in TRENDING_UP, SELL only in TRENDING_DOWN
 * - mean_reversion: BUY unless TRENDING_DOWN, SELL unless TRENDING_UP
 */
export type RegimePolicy = 'trend_following' | 'mean_reversion';

export interface RegimeFilterConfig {
  adxWindow: number; // Wilder period, both smoothing stages
  adxThreshold: number; // 0-100, ADX above this counts as trending
  policy?: RegimePolicy; // default trend_following
}

export interface MomentumFilterConfig {
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
}

export interface RegimeSummary {
  barsClassified: number;
  counts: Record<MarketRegime, number>;
  adxMean: number;
  adxMax: number;
  plusDiDominantBars: number;
  minusDiDominantBars: number;
}
