/**
 * BaseStrategy - shared signal composition for every strategy kind
 *
 * final entry = raw trigger AND regime gate AND momentum gate, then the
 * long-only rewrite. A gate that throws or returns a malformed mask is
 * replaced by an all-true mask for the run.
 */

import { EntryDirection, PriceSeries, SignalValue, StrategyKind } from '@quantsweep/shared-types';
import { DataError, FilterDegradationError, Logger, errorMessage } from '@quantsweep/shared-utils';
import { EntryFilter, PASS_THROUGH_FILTER } from '../filters';
import { IndicatorSeries } from '../indicators';
import { IndicatorFrame, ProtectiveLevels, Signal, SignalPipeline, StrategyOptions } from './types';

const logger = new Logger('Strategy');

/**
 * Golden cross (prevFast <= prevSlow, fast > slow) -> BUY; death cross -> SELL.
 */
export function detectCrossovers(fast: IndicatorSeries, slow: IndicatorSeries): SignalValue[] {
  return fast.map((current, i): SignalValue => {
    if (i === 0) return 'NEUTRAL';
    const prevFast = fast[i - 1];
    const prevSlow = slow[i - 1];
    if (prevFast <= prevSlow && current > slow[i]) return 'BUY';
    if (prevFast >= prevSlow && current < slow[i]) return 'SELL';
    return 'NEUTRAL';
  });
}

function validateMask(mask: unknown, expectedLength: number, filterName: string): boolean[] {
  if (!Array.isArray(mask)) {
    throw new FilterDegradationError(`${filterName} returned a non-array mask`, filterName);
  }
  if (mask.length !== expectedLength) {
    throw new FilterDegradationError(
      `${filterName} returned ${mask.length} values for ${expectedLength} bars`,
      filterName
    );
  }
  const checked: boolean[] = [];
  for (const value of mask) {
    if (typeof value !== 'boolean') {
      throw new FilterDegradationError(`${filterName} returned a non-boolean entry`, filterName);
    }
    checked.push(value);
  }
  return checked;
}

export abstract class BaseStrategy<K extends string = string> implements SignalPipeline<K> {
  abstract readonly kind: StrategyKind;
  readonly name: string;
  readonly longOnly: boolean;
  protected readonly regimeFilter: EntryFilter;
  protected readonly momentumFilter: EntryFilter;

  constructor(name: string, options: StrategyOptions = {}) {
    this.name = name;
    this.regimeFilter = options.regimeFilter ?? PASS_THROUGH_FILTER;
    this.momentumFilter = options.momentumFilter ?? PASS_THROUGH_FILTER;
    this.longOnly = options.longOnly ?? false;
  }

  /**
   * Warm-up needed by the strategy's own indicators.
   */
  protected abstract get ownLookbackPeriod(): number;

  get maxLookbackPeriod(): number {
    return Math.max(
      this.ownLookbackPeriod,
      this.regimeFilter.maxLookbackPeriod,
      this.momentumFilter.maxLookbackPeriod
    );
  }

  abstract calculateIndicators(series: PriceSeries): IndicatorFrame<K>;

  protected abstract computeTriggers(series: PriceSeries, frame: IndicatorFrame<K>): SignalValue[];

  /**
   * Stop-loss / take-profit attached to an entry at `index`. None by default.
   */
  protected protectiveLevels(
    _frame: IndicatorFrame<K>,
    _index: number,
    _direction: EntryDirection,
    _entryPrice: number
  ): ProtectiveLevels {
    return {};
  }

  generateSignals(series: PriceSeries, indicators: IndicatorFrame<K>): Signal[] {
    if (indicators.length !== series.length) {
      throw new DataError(
        `[${this.name}] indicator frame has ${indicators.length} rows for ${series.length} bars`
      );
    }

    const triggers = this.computeTriggers(series, indicators);
    const buyRegime = this.gate(this.regimeFilter, series, 'BUY');
    const sellRegime = this.gate(this.regimeFilter, series, 'SELL');
    const buyMomentum = this.gate(this.momentumFilter, series, 'BUY');
    const sellMomentum = this.gate(this.momentumFilter, series, 'SELL');

    return triggers.map((trigger, i): Signal => {
      let value: SignalValue = 'NEUTRAL';
      if (trigger === 'BUY' && buyRegime[i] && buyMomentum[i]) {
        value = 'BUY';
      } else if (trigger === 'SELL' && sellRegime[i] && sellMomentum[i]) {
        value = 'SELL';
      }

      if (this.longOnly && value === 'SELL') {
        value = 'NEUTRAL';
      }

      if (value === 'NEUTRAL') {
        return { value, trigger };
      }
      return { value, trigger, ...this.protectiveLevels(indicators, i, value, series[i].close) };
    });
  }

  describe(): string {
    const gates = [this.regimeFilter, this.momentumFilter]
      .filter((filter) => filter !== PASS_THROUGH_FILTER)
      .map((filter) => filter.name);
    return gates.length > 0 ? `${this.name} [${gates.join(', ')}]` : this.name;
  }

  private gate(filter: EntryFilter, series: PriceSeries, direction: EntryDirection): boolean[] {
    if (filter === PASS_THROUGH_FILTER) {
      return new Array<boolean>(series.length).fill(true);
    }
    try {
      const mask: unknown = filter.evaluate(series, direction);
      return validateMask(mask, series.length, filter.name);
    } catch (error) {
      logger.warn(
        `[Strategy] ${this.name}: ${filter.name} degraded to pass-through for ${direction} entries: ${errorMessage(error)}`
      );
      return new Array<boolean>(series.length).fill(true);
    }
  }
}
