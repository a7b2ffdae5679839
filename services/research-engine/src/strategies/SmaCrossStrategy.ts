import { PriceSeries, SignalValue } from '@quantsweep/shared-types';
import { ConfigurationError } from '@quantsweep/shared-utils';
import { assertWindow, sma } from '../indicators';
import { BaseStrategy, detectCrossovers } from './BaseStrategy';
import { IndicatorFrame, SmaCrossSpec, StrategyOptions } from './types';

type SmaColumns = 'smaFast' | 'smaSlow';

/**
 * Simple moving average crossover.
 */
export class SmaCrossStrategy extends BaseStrategy<SmaColumns> {
  readonly kind = 'sma_cross' as const;
  readonly fastWindow: number;
  readonly slowWindow: number;

  constructor(spec: Omit<SmaCrossSpec, 'kind'>, options: StrategyOptions = {}) {
    super(`SmaCross(${spec.fastWindow}/${spec.slowWindow})`, options);
    assertWindow(spec.fastWindow, 'fastWindow');
    assertWindow(spec.slowWindow, 'slowWindow');
    if (spec.fastWindow >= spec.slowWindow) {
      throw new ConfigurationError(
        `fastWindow (${spec.fastWindow}) must be less than slowWindow (${spec.slowWindow})`
      );
    }
    this.fastWindow = spec.fastWindow;
    this.slowWindow = spec.slowWindow;
  }

  protected get ownLookbackPeriod(): number {
    return this.slowWindow;
  }

  calculateIndicators(series: PriceSeries): IndicatorFrame<SmaColumns> {
    const closes = series.map((bar) => bar.close);
    return {
      length: series.length,
      columns: {
        smaFast: sma(closes, this.fastWindow),
        smaSlow: sma(closes, this.slowWindow),
      },
    };
  }

  protected computeTriggers(_series: PriceSeries, frame: IndicatorFrame<SmaColumns>): SignalValue[] {
    return detectCrossovers(frame.columns.smaFast, frame.columns.smaSlow);
  }
}
