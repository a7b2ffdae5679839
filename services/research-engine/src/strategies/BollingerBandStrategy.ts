/**
 * BollingerBandStrategy - mean reversion on band crossings
 *
 * BUY  : close crosses below the lower band (prev close >= lower, close < lower)
 * SELL : close crosses above the upper band (prev close <= upper, close > upper)
 */

import { EntryDirection, PriceSeries, SignalValue } from '@quantsweep/shared-types';
import { ConfigurationError } from '@quantsweep/shared-utils';
import { assertWindow, atr, bollingerBands } from '../indicators';
import { BaseStrategy } from './BaseStrategy';
import { BollingerBandSpec, IndicatorFrame, ProtectiveLevels, StrategyOptions } from './types';

type BollingerColumns = 'bbMiddle' | 'bbUpper' | 'bbLower' | 'atr';

export class BollingerBandStrategy extends BaseStrategy<BollingerColumns> {
  readonly kind = 'bollinger_band' as const;
  readonly bbWindow: number;
  readonly bbStdDev: number;
  readonly atrWindow?: number;
  readonly atrMultiplier?: number;

  constructor(spec: Omit<BollingerBandSpec, 'kind'>, options: StrategyOptions = {}) {
    super(`BollingerBand(${spec.bbWindow}, ${spec.bbStdDev})`, options);
    assertWindow(spec.bbWindow, 'bbWindow');
    if (!(spec.bbStdDev > 0)) {
      throw new ConfigurationError(`bbStdDev must be positive (got ${spec.bbStdDev})`);
    }
    if ((spec.atrWindow === undefined) !== (spec.atrMultiplier === undefined)) {
      throw new ConfigurationError('atrWindow and atrMultiplier must be supplied together');
    }
    if (spec.atrWindow !== undefined) {
      assertWindow(spec.atrWindow, 'atrWindow');
    }
    if (spec.atrMultiplier !== undefined && !(spec.atrMultiplier > 0)) {
      throw new ConfigurationError(`atrMultiplier must be positive (got ${spec.atrMultiplier})`);
    }

    this.bbWindow = spec.bbWindow;
    this.bbStdDev = spec.bbStdDev;
    this.atrWindow = spec.atrWindow;
    this.atrMultiplier = spec.atrMultiplier;
  }

  protected get ownLookbackPeriod(): number {
    return Math.max(this.bbWindow, this.atrWindow ?? 0);
  }

  calculateIndicators(series: PriceSeries): IndicatorFrame<BollingerColumns> {
    const bands = bollingerBands(
      series.map((bar) => bar.close),
      this.bbWindow,
      this.bbStdDev
    );
    return {
      length: series.length,
      columns: {
        bbMiddle: bands.middle,
        bbUpper: bands.upper,
        bbLower: bands.lower,
        atr: this.atrWindow !== undefined
          ? atr(series, this.atrWindow)
          : new Array<number>(series.length).fill(NaN),
      },
    };
  }

  protected computeTriggers(series: PriceSeries, frame: IndicatorFrame<BollingerColumns>): SignalValue[] {
    const { bbUpper, bbLower } = frame.columns;

    return series.map((bar, i): SignalValue => {
      if (i === 0) return 'NEUTRAL';
      const prevClose = series[i - 1].close;
      if (prevClose >= bbLower[i - 1] && bar.close < bbLower[i]) return 'BUY';
      if (prevClose <= bbUpper[i - 1] && bar.close > bbUpper[i]) return 'SELL';
      return 'NEUTRAL';
    });
  }

  protected protectiveLevels(
    frame: IndicatorFrame<BollingerColumns>,
    index: number,
    direction: EntryDirection,
    entryPrice: number
  ): ProtectiveLevels {
    const range = frame.columns.atr[index];
    if (this.atrMultiplier === undefined || !Number.isFinite(range)) {
      return {};
    }
    const distance = range * this.atrMultiplier;
    return { stopLossPrice: direction === 'BUY' ? entryPrice - distance : entryPrice + distance };
  }
}
