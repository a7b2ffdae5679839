import { EntryDirection, PriceSeries } from '@quantsweep/shared-types';
import { ConfigurationError } from '@quantsweep/shared-utils';
import { MacdSeries, assertWindow, macd } from '../indicators';
import { MomentumFilter, MomentumFilterConfig } from './types';

/**
 * MACD histogram confirmation: BUY needs histogram > 0, SELL needs histogram < 0.
 */
export class MacdMomentumFilter implements MomentumFilter {
  readonly name = 'macd_momentum';
  readonly macdFast: number;
  readonly macdSlow: number;
  readonly macdSignal: number;
  private cache = new WeakMap<PriceSeries, MacdSeries>();

  constructor(config: MomentumFilterConfig) {
    assertWindow(config.macdFast, 'macdFast');
    assertWindow(config.macdSlow, 'macdSlow');
    assertWindow(config.macdSignal, 'macdSignal');
    if (config.macdFast >= config.macdSlow) {
      throw new ConfigurationError(
        `macdFast (${config.macdFast}) must be less than macdSlow (${config.macdSlow})`
      );
    }
    this.macdFast = config.macdFast;
    this.macdSlow = config.macdSlow;
    this.macdSignal = config.macdSignal;
  }

  get maxLookbackPeriod(): number {
    return Math.max(this.macdFast, this.macdSlow);
  }

  indicators(series: PriceSeries): MacdSeries {
    const cached = this.cache.get(series);
    if (cached) {
      return cached;
    }
    const computed = macd(
      series.map((bar) => bar.close),
      this.macdFast,
      this.macdSlow,
      this.macdSignal
    );
    this.cache.set(series, computed);
    return computed;
  }

  histogram(series: PriceSeries): number[] {
    return [...this.indicators(series).histogram];
  }

  evaluate(series: PriceSeries, direction: EntryDirection): boolean[] {
    const { histogram } = this.indicators(series);
    return direction === 'BUY' ? histogram.map((value) => value > 0) : histogram.map((value) => value < 0);
  }
}
