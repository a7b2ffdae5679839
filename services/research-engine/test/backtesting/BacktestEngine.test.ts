/**
 * BacktestEngine Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { EntryDirection, PriceSeries } from '@quantsweep/shared-types';
import { ConfigurationError, DataError } from '@quantsweep/shared-utils';
import { BacktestEngine } from '../../src/backtesting/BacktestEngine';
import { AdxRegimeFilter, EntryFilter } from '../../src/filters';
import { SmaCrossStrategy } from '../../src/strategies';
import { BUY, SELL, scriptedPipeline } from '../helpers/pipelines';
import { HOUR_MS, T0, bar, seriesFromCloses } from '../helpers/series';

const settings = { symbol: 'BTC/USDT', timeframe: '1h', initialCapital: 10000 };
const flat = (length: number, price = 100) => seriesFromCloses(new Array<number>(length).fill(price));
const END = T0 + 1000 * HOUR_MS;

// Golden cross of SMA(5)/SMA(20) at bar 30, death cross 50 bars later at bar 80
const crossCloses = [
  ...new Array<number>(30).fill(100),
  ...new Array<number>(50).fill(110),
  ...new Array<number>(40).fill(90),
];

// Lets BUY entries through before bar `openUntil` and blocks every entry after it
class ClosingRegime implements EntryFilter {
  readonly name = 'closing_regime';
  readonly maxLookbackPeriod = 0;

  constructor(private readonly openUntil: number) {}

  evaluate(series: PriceSeries, direction: EntryDirection): boolean[] {
    return series.map((_, i) => direction === 'BUY' && i < this.openUntil);
  }
}

describe('BacktestEngine', () => {
  describe('constructor', () => {
    it('should reject an unknown timeframe before any data is touched', () => {
      expect(() => new BacktestEngine({ ...settings, timeframe: '1y' })).toThrow(ConfigurationError);
    });

    it('should reject protective percentages outside (0, 1)', () => {
      expect(() => new BacktestEngine({ ...settings, stopLossPct: 1.5 })).toThrow(ConfigurationError);
    });
  });

  describe('run', () => {
    describe('warm-up', () => {
      it('should drop the first maxLookbackPeriod bars and ignore their signals', () => {
        const engine = new BacktestEngine(settings);
        const report = engine.run(flat(10), T0, END, scriptedPipeline({ 1: BUY }, 3));
        expect(report.warmupBarsDropped).toBe(3);
        expect(report.firstBarIndex).toBe(3);
        expect(report.barsEvaluated).toBe(7);
        expect(report.metrics.equityCurve).toHaveLength(7);
        expect(report.metrics.tradeCount).toBe(0);
        expect(report.openPosition).toBeNull();
      });

      it('should start at the requested start once the buffer is warm', () => {
        const engine = new BacktestEngine(settings);
        const report = engine.run(flat(10), T0 + 5 * HOUR_MS, END, scriptedPipeline({}, 2));
        expect(report.firstBarIndex).toBe(5);
        expect(report.firstTimestamp).toBe(T0 + 5 * HOUR_MS);
        expect(report.barsEvaluated).toBe(5);
      });

      it('should throw DataError when the series is not longer than the lookback', () => {
        const engine = new BacktestEngine(settings);
        expect(() => engine.run(flat(3), T0, END, scriptedPipeline({}, 3))).toThrow(DataError);
      });

      it('should throw DataError when no bar is left inside the window', () => {
        const engine = new BacktestEngine(settings);
        expect(() => engine.run(flat(10), T0, T0 + 2 * HOUR_MS, scriptedPipeline({}, 4))).toThrow(DataError);
      });

      it('should reject a window whose start is after its end', () => {
        const engine = new BacktestEngine(settings);
        expect(() => engine.run(flat(10), END, T0, scriptedPipeline({}))).toThrow(ConfigurationError);
      });
    });

    describe('trades', () => {
      it('should enter at the signal close and exit on the opposite trigger', () => {
        const closes = [100, 100, 100, 100, 105, 110, 110];
        const engine = new BacktestEngine(settings);
        const report = engine.run(seriesFromCloses(closes), T0, END, scriptedPipeline({ 3: BUY, 5: SELL }));

        expect(report.trades).toHaveLength(1);
        const [trade] = report.trades;
        expect(trade.side).toBe('long');
        expect(trade.entryPrice).toBe(100);
        expect(trade.exitPrice).toBe(110);
        expect(trade.quantity).toBe(100);
        expect(trade.pnl).toBe(1000);
        expect(trade.returnPct).toBeCloseTo(0.1, 12);
        expect(trade.exitReason).toBe('STRATEGY_SIGNAL');
        expect(trade.entryTimestamp).toBe(T0 + 3 * HOUR_MS);
        expect(trade.exitTimestamp).toBe(T0 + 5 * HOUR_MS);
        expect(report.metrics.totalReturn).toBeCloseTo(0.1, 12);
      });

      it('should not open a new position on the bar where an exit fired', () => {
        const engine = new BacktestEngine(settings);
        const report = engine.run(flat(8), T0, END, scriptedPipeline({ 2: BUY, 4: SELL }));
        expect(report.trades).toHaveLength(1);
        expect(report.openPosition).toBeNull();
      });

      it('should exit on a raw opposite trigger even when the entry was filtered out', () => {
        const engine = new BacktestEngine(settings);
        const report = engine.run(
          flat(8),
          T0,
          END,
          scriptedPipeline({ 2: BUY, 5: { value: 'NEUTRAL', trigger: 'SELL' } })
        );

        expect(report.trades).toHaveLength(1);
        expect(report.trades[0].exitReason).toBe('STRATEGY_SIGNAL');
        expect(report.trades[0].exitTimestamp).toBe(T0 + 5 * HOUR_MS);
        expect(report.openPosition).toBeNull();
      });

      it('should profit from a falling market on a short', () => {
        const closes = [100, 100, 95, 90, 90];
        const engine = new BacktestEngine(settings);
        const report = engine.run(seriesFromCloses(closes), T0, END, scriptedPipeline({ 1: SELL, 3: BUY }));
        expect(report.trades[0].side).toBe('short');
        expect(report.trades[0].returnPct).toBeCloseTo(0.1, 12);
      });

      it('should size later trades from realized equity', () => {
        const closes = [100, 110, 110, 100, 100];
        const engine = new BacktestEngine(settings);
        const report = engine.run(seriesFromCloses(closes), T0, END, scriptedPipeline({ 0: BUY, 1: SELL, 2: BUY, 4: SELL }));
        // equity 1.1 after the first trade -> 11000 / 110
        expect(report.trades[1].quantity).toBeCloseTo(100, 9);
        expect(report.trades[1].exitPrice).toBe(100);
      });

      it('should report a position still open at the end instead of closing it', () => {
        const engine = new BacktestEngine(settings);
        const report = engine.run(flat(6), T0, END, scriptedPipeline({ 2: BUY }));
        expect(report.metrics.tradeCount).toBe(0);
        expect(report.metrics.totalReturn).toBe(0);
        expect(report.metrics.sharpeRatio).toBe(0);
        expect(report.openPosition).toMatchObject({ side: 'long', entryPrice: 100, entryTimestamp: T0 + 2 * HOUR_MS });
      });
    });

    describe('exit priority', () => {
      it('should prefer the stop-loss when a bar touches both stop and target', () => {
        const series = [bar(0, 100, 100, 100, 100), bar(1, 100, 112, 90, 100), bar(2, 100, 100, 100, 100)];
        const entry = { ...BUY, stopLossPrice: 95, takeProfitPrice: 110 };
        const report = new BacktestEngine(settings).run(series, T0, END, scriptedPipeline({ 0: entry }));
        expect(report.trades[0].exitReason).toBe('STOP_LOSS');
        expect(report.trades[0].exitPrice).toBe(95);
      });

      it('should fill at the open when the bar gaps through the stop', () => {
        const series = [bar(0, 100, 100, 100, 100), bar(1, 92, 93, 91, 92)];
        const entry = { ...BUY, stopLossPrice: 95 };
        const report = new BacktestEngine(settings).run(series, T0, END, scriptedPipeline({ 0: entry }));
        expect(report.trades[0].exitPrice).toBe(92);
      });

      it('should take profit at the target level', () => {
        const series = [bar(0, 100, 100, 100, 100), bar(1, 100, 112, 99, 108)];
        const entry = { ...BUY, stopLossPrice: 95, takeProfitPrice: 110 };
        const report = new BacktestEngine(settings).run(series, T0, END, scriptedPipeline({ 0: entry }));
        expect(report.trades[0].exitReason).toBe('TAKE_PROFIT');
        expect(report.trades[0].exitPrice).toBe(110);
      });

      it('should prefer take-profit over a strategy exit on the same bar', () => {
        const series = [bar(0, 100, 100, 100, 100), bar(1, 100, 112, 99, 108)];
        const entry = { ...BUY, takeProfitPrice: 110 };
        const report = new BacktestEngine(settings).run(series, T0, END, scriptedPipeline({ 0: entry, 1: SELL }));
        expect(report.trades[0].exitReason).toBe('TAKE_PROFIT');
      });

      it('should stop a short above the entry', () => {
        const series = [bar(0, 100, 100, 100, 100), bar(1, 100, 104, 99, 103)];
        const entry = { ...SELL, stopLossPrice: 103 };
        const report = new BacktestEngine(settings).run(series, T0, END, scriptedPipeline({ 0: entry }));
        expect(report.trades[0].exitReason).toBe('STOP_LOSS');
        expect(report.trades[0].exitPrice).toBe(103);
        expect(report.trades[0].pnl).toBe(-300);
      });

      it('should fall back to percentage stops when the signal carries none', () => {
        const series = [bar(0, 100, 100, 100, 100), bar(1, 99, 99, 97.5, 98.5)];
        const engine = new BacktestEngine({ ...settings, stopLossPct: 0.02 });
        const report = engine.run(series, T0, END, scriptedPipeline({ 0: BUY }));
        expect(report.trades[0].exitReason).toBe('STOP_LOSS');
        expect(report.trades[0].exitPrice).toBe(98);
        expect(report.trades[0].returnPct).toBeCloseTo(-0.02, 12);
      });
    });

    describe('max hold period', () => {
      it('should force-close once more than maxHoldHours have elapsed', () => {
        const engine = new BacktestEngine({ ...settings, maxHoldHours: 24 });
        const report = engine.run(flat(40), T0, END, scriptedPipeline({ 2: BUY }));
        expect(report.trades).toHaveLength(1);
        const [trade] = report.trades;
        expect(trade.exitReason).toBe('MAX_HOLD_PERIOD');
        expect(trade.exitTimestamp).toBe(T0 + 27 * HOUR_MS);
        expect(trade.exitTimestamp - trade.entryTimestamp).toBeGreaterThanOrEqual(24 * HOUR_MS);
      });

      it('should rank the max hold exit below a stop on the same bar', () => {
        const series = [bar(0, 100, 100, 100, 100), bar(1, 100, 100, 100, 100), bar(2, 100, 100, 90, 95)];
        const engine = new BacktestEngine({ ...settings, maxHoldHours: 1 });
        const report = engine.run(series, T0, END, scriptedPipeline({ 0: { ...BUY, stopLossPrice: 95 } }));
        expect(report.trades[0].exitReason).toBe('STOP_LOSS');
      });
    });

    describe('scenarios', () => {
      it('should take one long trade from golden cross to death cross', () => {
        const strategy = new SmaCrossStrategy({ fastWindow: 5, slowWindow: 20 });
        const report = new BacktestEngine(settings).run(seriesFromCloses(crossCloses), T0, END, strategy);

        expect(report.trades).toHaveLength(1);
        const [trade] = report.trades;
        expect(trade.side).toBe('long');
        expect(trade.entryTimestamp).toBe(T0 + 30 * HOUR_MS);
        expect(trade.exitTimestamp).toBe(T0 + 80 * HOUR_MS);
        expect(trade.exitReason).toBe('STRATEGY_SIGNAL');
        expect(trade.returnPct).toBeCloseTo(-20 / 110, 12);
      });

      it('should take no entries when the regime filter sees only RANGING bars', () => {
        const strategy = new SmaCrossStrategy(
          { fastWindow: 5, slowWindow: 20 },
          { regimeFilter: new AdxRegimeFilter({ adxWindow: 14, adxThreshold: 100 }) }
        );
        const report = new BacktestEngine(settings).run(seriesFromCloses(crossCloses), T0, END, strategy);
        expect(report.warmupBarsDropped).toBe(28);
        expect(report.trades).toHaveLength(0);
        expect(report.openPosition).toBeNull();
      });

      it('should still close an open position after the regime filter starts blocking entries', () => {
        const strategy = new SmaCrossStrategy({ fastWindow: 5, slowWindow: 20 }, { regimeFilter: new ClosingRegime(40) });
        const report = new BacktestEngine(settings).run(seriesFromCloses(crossCloses), T0, END, strategy);

        expect(report.trades).toHaveLength(1);
        const [trade] = report.trades;
        expect(trade.entryTimestamp).toBe(T0 + 30 * HOUR_MS);
        expect(trade.exitTimestamp).toBe(T0 + 80 * HOUR_MS);
        expect(trade.exitReason).toBe('STRATEGY_SIGNAL');
        expect(report.openPosition).toBeNull();
      });

      it('should be deterministic for identical inputs', () => {
        const series = seriesFromCloses(crossCloses);
        const strategy = new SmaCrossStrategy({ fastWindow: 5, slowWindow: 20 });
        const first = new BacktestEngine(settings).run(series, T0, END, strategy);
        const second = new BacktestEngine(settings).run(series, T0, END, strategy);
        expect(second).toEqual(first);
      });
    });
  });
});
