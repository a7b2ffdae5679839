import { describe, it, expect, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DataError } from '@quantsweep/shared-utils';
import {
  buildOptimizationReport,
  formatBoundary,
  fromArtifactResult,
  parseOptimizationReport,
  readOptimizationReport,
  strategyKindForLayout,
} from '../../src/optimization/OptimizationReport';
import { OptimizationResult, SearchSummary } from '../../src/optimization/OptimizationTypes';
import { metrics } from '../helpers/results';

const START = Date.UTC(2024, 0, 1);
const SPLIT = Date.UTC(2024, 1, 1);
const END = Date.UTC(2024, 2, 1);

const validatedResult: OptimizationResult = {
  params: { fastWindow: 5, slowWindow: 20 },
  isMetrics: metrics(1.2, 0.1, -0.05, 3),
  oosMetrics: metrics(0.8, 0.04, -0.02, 2),
  robustnessFactor: 0.5,
  degradationRatio: 0.75,
};

const walkForwardSummary: SearchSummary = {
  validationMode: 'walk_forward',
  totalCombinations: 4,
  validCombinations: 4,
  combinationsTested: 4,
  failedCombinations: 0,
  outOfSampleTested: 1,
  splitDate: SPLIT,
};

const context = {
  symbol: 'BTC/USDT',
  timeframe: '1h',
  start: START,
  end: END,
  strategy: 'sma_cross',
  generatedAt: '2024-03-02T00:00:00.000Z',
};

describe('OptimizationReport', () => {
  describe('buildOptimizationReport', () => {
    it('should describe a walk-forward run with both periods', () => {
      const report = buildOptimizationReport([validatedResult], walkForwardSummary, { ...context, splitDate: SPLIT });

      expect(report.metadata).toEqual({
        timestamp: '2024-03-02T00:00:00.000Z',
        symbol: 'BTC/USDT',
        timeframe: '1h',
        start_date: '2024-01-01',
        end_date: '2024-03-01',
        split_date: '2024-02-01',
        validation_mode: 'walk_forward',
        in_sample_period: '2024-01-01 to 2024-02-01',
        out_of_sample_period: '2024-02-01 to 2024-03-01',
        total_combinations_tested: 4,
        strategy: 'sma_cross',
        long_only: false,
        macd_slow: null,
        macd_signal: null,
      });
      expect(report.results).toEqual([
        {
          params: { fast_window: 5, slow_window: 20 },
          IS_metrics: { total_return: 0.1, sharpe_ratio: 1.2, max_drawdown: -0.05, trade_count: 3 },
          OOS_metrics: { total_return: 0.04, sharpe_ratio: 0.8, max_drawdown: -0.02, trade_count: 2 },
          robustness_factor: 0.5,
          degradation_ratio: 0.75,
        },
      ]);
    });

    it('should leave out-of-sample fields out of a standard run', () => {
      const summary: SearchSummary = { ...walkForwardSummary, validationMode: 'standard', splitDate: undefined };
      const report = buildOptimizationReport(
        [{ params: { bbWindow: 20, bbStdDev: 2 }, isMetrics: metrics(0.4) }],
        summary,
        { ...context, strategy: 'bollinger_band' }
      );

      expect(report.metadata.split_date).toBeNull();
      expect(report.metadata.out_of_sample_period).toBeNull();
      expect(report.metadata.in_sample_period).toBe('2024-01-01 to 2024-03-01');
      expect(report.results[0].params).toEqual({ bb_window: 20, bb_std_dev: 2 });
      expect('OOS_metrics' in report.results[0]).toBe(false);
      expect('robustness_factor' in report.results[0]).toBe(false);
    });

    it('should record long-only runs and the fixed MACD periods', () => {
      const report = buildOptimizationReport([validatedResult], walkForwardSummary, {
        ...context,
        splitDate: SPLIT,
        longOnly: true,
        macdSlow: 26,
        macdSignal: 9,
      });

      expect(report.metadata.long_only).toBe(true);
      expect(report.metadata.macd_slow).toBe(26);
      expect(report.metadata.macd_signal).toBe(9);
    });

    it('should keep the time of an intraday split', () => {
      const split = Date.UTC(2024, 0, 15, 14);
      const report = buildOptimizationReport([validatedResult], { ...walkForwardSummary, splitDate: split }, {
        ...context,
        splitDate: split,
      });

      expect(report.metadata.split_date).toBe('2024-01-15T14:00:00.000Z');
      expect(report.metadata.in_sample_period).toBe('2024-01-01 to 2024-01-15T14:00:00.000Z');
      expect(report.metadata.out_of_sample_period).toBe('2024-01-15T14:00:00.000Z to 2024-03-01');
    });
  });

  describe('formatBoundary', () => {
    it('should print midnight as a date and anything else as a timestamp', () => {
      expect(formatBoundary(START)).toBe('2024-01-01');
      expect(formatBoundary(START + 30 * 60 * 1000)).toBe('2024-01-01T00:30:00.000Z');
    });
  });

  describe('strategyKindForLayout', () => {
    it('should name the strategy a layout parameterizes', () => {
      expect(strategyKindForLayout({ family: 'moving_average', dimensions: ['fastWindow', 'slowWindow'] })).toBe(
        'sma_cross'
      );
      expect(
        strategyKindForLayout({
          family: 'moving_average',
          dimensions: ['fastWindow', 'slowWindow', 'atrWindow', 'atrMultiplier'],
        })
      ).toBe('volatility_adjusted');
      expect(strategyKindForLayout({ family: 'bollinger', dimensions: ['bbWindow', 'bbStdDev'] })).toBe(
        'bollinger_band'
      );
    });
  });

  describe('parseOptimizationReport', () => {
    const built = buildOptimizationReport([validatedResult], walkForwardSummary, { ...context, splitDate: SPLIT });

    it('should read back what was built', () => {
      const document: unknown = JSON.parse(JSON.stringify(built));
      expect(parseOptimizationReport(document)).toEqual(built);
    });

    it('should default a missing strategy to unknown', () => {
      const { strategy: _dropped, ...metadata } = built.metadata;
      const parsed = parseOptimizationReport({ metadata, results: built.results });
      expect(parsed.metadata.strategy).toBe('unknown');
    });

    it('should treat an artifact without long_only as a long-and-short run', () => {
      const { long_only: _dropped, ...metadata } = built.metadata;
      const parsed = parseOptimizationReport({ metadata, results: built.results });
      expect(parsed.metadata.long_only).toBe(false);
    });

    it('should reject a non-boolean long_only', () => {
      const metadata = { ...built.metadata, long_only: 'yes' };
      expect(() => parseOptimizationReport({ metadata, results: [] })).toThrow('metadata.long_only must be a boolean');
    });

    it('should reject documents without a results array', () => {
      expect(() => parseOptimizationReport({ metadata: built.metadata })).toThrow(DataError);
      expect(() => parseOptimizationReport([])).toThrow(DataError);
    });

    it('should reject an unknown validation mode', () => {
      const metadata = { ...built.metadata, validation_mode: 'rolling' };
      expect(() => parseOptimizationReport({ metadata, results: [] })).toThrow(DataError);
    });

    it('should reject a metrics block with a null Sharpe ratio', () => {
      const result = { ...built.results[0], IS_metrics: { total_return: 0.1, sharpe_ratio: null, max_drawdown: 0 } };
      expect(() => parseOptimizationReport({ metadata: built.metadata, results: [result] })).toThrow(
        'results[0].IS_metrics needs numeric total_return, sharpe_ratio and max_drawdown'
      );
    });

    it('should reject params with no recognized keys', () => {
      const result = { ...built.results[0], params: { lookback: 3 } };
      expect(() => parseOptimizationReport({ metadata: built.metadata, results: [result] })).toThrow(
        'results[0].params has no recognized parameters'
      );
    });
  });

  describe('readOptimizationReport', () => {
    let dir: string | undefined;

    afterEach(async () => {
      if (dir) {
        await fs.rm(dir, { recursive: true, force: true });
        dir = undefined;
      }
    });

    it('should throw DataError for a file that is not JSON', async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'report-'));
      const file = path.join(dir, 'broken.json');
      await fs.writeFile(file, '{"metadata":', 'utf8');
      await expect(readOptimizationReport(file)).rejects.toThrow(DataError);
    });
  });

  describe('fromArtifactResult', () => {
    it('should restore engine-side names and default the trade count', () => {
      const restored = fromArtifactResult({
        params: { fast_window: 5, slow_window: 20, unused: 1 },
        IS_metrics: { total_return: 0.1, sharpe_ratio: 1.2, max_drawdown: -0.05 },
      });
      expect(restored).toEqual({
        params: { fastWindow: 5, slowWindow: 20 },
        isMetrics: { totalReturn: 0.1, sharpeRatio: 1.2, maxDrawdown: -0.05, equityCurve: [], tradeCount: 0 },
      });
    });
  });
});
