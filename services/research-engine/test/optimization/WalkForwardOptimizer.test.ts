import { describe, it, expect, beforeEach } from '@jest/globals';
import { PriceBar } from '@quantsweep/shared-types';
import { ConfigurationError, DataError } from '@quantsweep/shared-utils';
import { createEngineSettings } from '../../src/config';
import { InMemoryPriceDataSource } from '../../src/data/InMemoryPriceDataSource';
import { WalkForwardOptimizer } from '../../src/optimization/WalkForwardOptimizer';
import { HOUR_MS, T0, seriesFromCloses, waveCloses } from '../helpers/series';

const settings = createEngineSettings({ warmupBufferBars: 50, defaultTopN: 2 });
const START = T0 + 100 * HOUR_MS;
const SPLIT = T0 + 350 * HOUR_MS;
const END = T0 + 599 * HOUR_MS;
const maRanges = { fastWindow: [5, 10], slowWindow: [20, 40] };

function waveSeries(): PriceBar[] {
  return seriesFromCloses(waveCloses(600, 100, 10, 60, 0.01), 0.5);
}

describe('WalkForwardOptimizer', () => {
  let source: InMemoryPriceDataSource;
  let optimizer: WalkForwardOptimizer;

  beforeEach(() => {
    source = new InMemoryPriceDataSource(waveSeries());
    optimizer = new WalkForwardOptimizer(settings);
  });

  describe('loadOnce', () => {
    it('should request the warm-up buffer and freeze the series', async () => {
      const series = await optimizer.loadOnce(source, 'BTC/USDT', '1h', START, END);
      expect(series[0].timestamp).toBe(T0 + 50 * HOUR_MS);
      expect(series).toHaveLength(550);
      expect(Object.isFrozen(series)).toBe(true);
      expect(Object.isFrozen(series[0])).toBe(true);
    });

    it('should refuse a second load', async () => {
      await optimizer.loadOnce(source, 'BTC/USDT', '1h', START, END);
      await expect(optimizer.loadOnce(source, 'BTC/USDT', '1h', START, END)).rejects.toThrow(ConfigurationError);
    });

    it('should reject an unknown timeframe and an inverted window', async () => {
      await expect(optimizer.loadOnce(source, 'BTC/USDT', '1y', START, END)).rejects.toThrow(ConfigurationError);
      await expect(optimizer.loadOnce(source, 'BTC/USDT', '1h', END, START)).rejects.toThrow(ConfigurationError);
    });

    it('should throw DataError when the source returns nothing', async () => {
      const empty = new InMemoryPriceDataSource([]);
      await expect(optimizer.loadOnce(empty, 'BTC/USDT', '1h', START, END)).rejects.toThrow(DataError);
    });
  });

  describe('search', () => {
    it('should require a loaded series', () => {
      expect(() => optimizer.search(maRanges)).toThrow(ConfigurationError);
    });

    describe('walk-forward', () => {
      beforeEach(async () => {
        await optimizer.loadOnce(source, 'BTC/USDT', '1h', START, END);
      });

      it('should validate the top N in-sample results out of sample from a single load', () => {
        const results = optimizer.search(maRanges, SPLIT);
        const inSample = optimizer.inSampleResults;

        expect(source.requestCount).toBe(1);
        expect(inSample.length).toBeLessThanOrEqual(4);
        expect(inSample).toHaveLength(4);
        expect(results).toHaveLength(2);
        expect(results.map((r) => r.params)).toEqual(inSample.slice(0, 2).map((r) => r.params));
        expect(results.every((r) => r.oosMetrics !== undefined)).toBe(true);
        expect(results[0].isMetrics.sharpeRatio).toBeGreaterThanOrEqual(results[1].isMetrics.sharpeRatio);
      });

      it('should return fewer than top N when fewer combinations exist', () => {
        const results = optimizer.search({ fastWindow: [5], slowWindow: [20] }, SPLIT, 5);
        expect(results).toHaveLength(1);
      });

      it('should report a walk-forward summary', () => {
        optimizer.search(maRanges, SPLIT);
        expect(optimizer.lastRunSummary).toEqual({
          validationMode: 'walk_forward',
          totalCombinations: 4,
          validCombinations: 4,
          combinationsTested: 4,
          failedCombinations: 0,
          outOfSampleTested: 2,
          splitDate: SPLIT,
        });
      });

      it('should reject a split date outside the window', () => {
        expect(() => optimizer.search(maRanges, START)).toThrow(ConfigurationError);
        expect(() => optimizer.search(maRanges, END + HOUR_MS)).toThrow(ConfigurationError);
      });

      it('should reject a non-positive top N', () => {
        expect(() => optimizer.search(maRanges, SPLIT, 0)).toThrow(ConfigurationError);
      });
    });

    describe('standard', () => {
      beforeEach(async () => {
        await optimizer.loadOnce(source, 'BTC/USDT', '1h', START, END);
      });

      it('should return every valid combination ranked by Sharpe', () => {
        const results = optimizer.search(maRanges);
        expect(results).toHaveLength(4);
        const sharpes = results.map((r) => r.isMetrics.sharpeRatio);
        expect([...sharpes].sort((a, b) => b - a)).toEqual(sharpes);
        expect(results.every((r) => r.oosMetrics === undefined)).toBe(true);
        expect(optimizer.lastRunSummary?.validationMode).toBe('standard');
      });

      it('should drop combinations with fast >= slow before running them', () => {
        const results = optimizer.search({ fastWindow: [10, 20], slowWindow: [20] });
        expect(results.map((r) => r.params)).toEqual([{ fastWindow: 10, slowWindow: 20 }]);
        expect(optimizer.lastRunSummary?.totalCombinations).toBe(2);
        expect(optimizer.lastRunSummary?.validCombinations).toBe(1);
      });

      it('should skip a combination that fails with a data error and keep going', () => {
        const results = optimizer.search({ fastWindow: [5], slowWindow: [20, 600] });
        expect(results).toHaveLength(1);
        expect(optimizer.lastRunSummary?.failedCombinations).toBe(1);
      });

      it('should propagate configuration errors from the range shape', () => {
        expect(() => optimizer.search({ fastWindow: [5], slowWindow: [20], atrWindow: [14] })).toThrow(ConfigurationError);
      });
    });

    it('should break Sharpe ties in cartesian order', async () => {
      const flatSource = new InMemoryPriceDataSource(seriesFromCloses(new Array<number>(600).fill(100)));
      await optimizer.loadOnce(flatSource, 'BTC/USDT', '1h', START, END);
      const results = optimizer.search(maRanges);
      expect(results.map((r) => r.params)).toEqual([
        { fastWindow: 5, slowWindow: 20 },
        { fastWindow: 5, slowWindow: 40 },
        { fastWindow: 10, slowWindow: 20 },
        { fastWindow: 10, slowWindow: 40 },
      ]);
    });
  });
});
