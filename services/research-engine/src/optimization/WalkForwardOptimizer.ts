/**
 * WalkForwardOptimizer - grid search with optional in-sample / out-of-sample validation
 *
 * Load once, evaluate many:
 * 1. loadOnce() fetches the buffered series a single time and freezes it
 * 2. search() builds the cartesian product of the supplied ranges
 * 3. Without a split: every valid combination runs over [start, end], ranked by Sharpe
 * 4. With a split: every valid combination runs over [start, split], the top N by
 *    in-sample Sharpe are re-run over [split, end]
 */

import { PriceBar, PriceSeries } from '@quantsweep/shared-types';
import {
  ConfigurationError,
  DataError,
  Logger,
  errorMessage,
  formatUtcDate,
} from '@quantsweep/shared-utils';
import { BacktestEngine } from '../backtesting/BacktestEngine';
import { BacktestMetrics } from '../backtesting/types';
import { EngineSettings } from '../config';
import { PriceDataSource } from '../data/types';
import { assertPriceSeries } from '../data/validation';
import { timeframeToMilliseconds } from '../indicators';
import { buildPipeline } from '../strategies/StrategyFactory';
import {
  DimensionLayout,
  OptimizationResult,
  ParameterConfiguration,
  ParameterRanges,
  SearchSummary,
} from './OptimizationTypes';
import {
  countCombinations,
  describeParams,
  detectDimensions,
  generateCombinations,
  isValidCombination,
  strategyConfigFromParameters,
} from './ParameterSpace';

const logger = new Logger('WalkForwardOptimizer');

export interface LoadedWindow {
  symbol: string;
  timeframe: string;
  start: number; // epoch millis, requested window start (buffer excluded)
  end: number;
}

interface InSampleEntry {
  params: ParameterConfiguration;
  metrics: BacktestMetrics;
}

/**
 * Checks the date window and split before any data is fetched.
 */
export function assertSearchWindow(start: number, end: number, splitDate?: number): void {
  if (!(start < end)) {
    throw new ConfigurationError(`Start date must be before end date (${formatUtcDate(start)} / ${formatUtcDate(end)})`);
  }
  if (splitDate !== undefined && !(start < splitDate && splitDate < end)) {
    throw new ConfigurationError(
      `Split date ${formatUtcDate(splitDate)} must fall strictly between ${formatUtcDate(start)} and ${formatUtcDate(end)}`
    );
  }
}

export function assertTopN(topN: number): void {
  if (!Number.isInteger(topN) || topN < 1) {
    throw new ConfigurationError(`top_n must be a positive integer (got ${topN})`);
  }
}

function bySharpeDescending(a: { metrics: BacktestMetrics }, b: { metrics: BacktestMetrics }): number {
  return b.metrics.sharpeRatio - a.metrics.sharpeRatio;
}

export class WalkForwardOptimizer {
  private readonly settings: Readonly<EngineSettings>;
  private series: PriceSeries | null = null;
  private window: LoadedWindow | null = null;
  private summary: SearchSummary | null = null;
  private layout: DimensionLayout | null = null;
  private inSample: OptimizationResult[] = [];

  constructor(settings: Readonly<EngineSettings>) {
    this.settings = settings;
  }

  /**
   * Fetch the series once, with warmupBufferBars of history before `start`.
   */
  async loadOnce(
    dataSource: PriceDataSource,
    symbol: string,
    timeframe: string,
    start: number,
    end: number
  ): Promise<PriceSeries> {
    if (this.series) {
      throw new ConfigurationError('Price series already loaded; create a new optimizer for another window');
    }
    const stepMs = timeframeToMilliseconds(timeframe);
    assertSearchWindow(start, end);

    const bufferStart = start - this.settings.warmupBufferBars * stepMs;
    logger.info(
      `[WalkForwardOptimizer] Loading ${symbol} ${timeframe} from ${formatUtcDate(bufferStart)} ` +
        `(${this.settings.warmupBufferBars} bar buffer) to ${formatUtcDate(end)} via ${dataSource.name}`
    );

    const loaded = await dataSource.getSeries(symbol, timeframe, bufferStart, end);
    assertPriceSeries(loaded, `${symbol} ${timeframe}`);
    if (loaded.length === 0) {
      throw new DataError(`No ${timeframe} data returned for ${symbol}`);
    }

    this.series = Object.freeze(loaded.map((bar): PriceBar => Object.freeze({ ...bar })));
    this.window = { symbol, timeframe, start, end };
    logger.info(`[WalkForwardOptimizer] Cached ${this.series.length} bars; all evaluations share this copy`);
    return this.series;
  }

  get loadedWindow(): LoadedWindow | null {
    return this.window;
  }

  get lastRunSummary(): SearchSummary | null {
    return this.summary;
  }

  get lastLayout(): DimensionLayout | null {
    return this.layout;
  }

  /**
   * In-sample results of the last walk-forward search, ranked by Sharpe.
   */
  get inSampleResults(): OptimizationResult[] {
    return [...this.inSample];
  }

  search(ranges: ParameterRanges, splitDate?: number, topN: number = this.settings.defaultTopN): OptimizationResult[] {
    const { series, window } = this.requireLoaded();

    const layout = detectDimensions(ranges);
    assertTopN(topN);
    assertSearchWindow(window.start, window.end, splitDate);

    const combinations = generateCombinations(ranges, layout);
    const valid = combinations.filter((params) => isValidCombination(params, layout, this.settings));
    this.layout = layout;
    this.inSample = [];

    logger.info(
      `[WalkForwardOptimizer] ${layout.dimensions.length}D search (${layout.dimensions.join(', ')}): ` +
        `${countCombinations(ranges, layout)} combinations, ${valid.length} valid`
    );

    if (splitDate === undefined) {
      return this.standardSearch(series, window, valid, combinations.length);
    }
    return this.walkForwardSearch(series, window, valid, combinations.length, splitDate, topN);
  }

  private standardSearch(
    series: PriceSeries,
    window: LoadedWindow,
    valid: ParameterConfiguration[],
    totalCombinations: number
  ): OptimizationResult[] {
    const entries = this.runPhase(series, window, valid, window.start, window.end, 'full');
    const ranked = [...entries].sort(bySharpeDescending);

    this.summary = {
      validationMode: 'standard',
      totalCombinations,
      validCombinations: valid.length,
      combinationsTested: entries.length,
      failedCombinations: valid.length - entries.length,
      outOfSampleTested: 0,
    };
    logger.info(
      `[WalkForwardOptimizer] Completed ${entries.length}/${valid.length} backtests` +
        (ranked[0] ? `; best Sharpe ${ranked[0].metrics.sharpeRatio.toFixed(3)} (${describeParams(ranked[0].params)})` : '')
    );

    return ranked.map((entry) => ({ params: entry.params, isMetrics: entry.metrics }));
  }

  private walkForwardSearch(
    series: PriceSeries,
    window: LoadedWindow,
    valid: ParameterConfiguration[],
    totalCombinations: number,
    splitDate: number,
    topN: number
  ): OptimizationResult[] {
    logger.info(
      `[WalkForwardOptimizer] Phase 1 (in-sample) ${formatUtcDate(window.start)} to ${formatUtcDate(splitDate)}`
    );
    const inSample = this.runPhase(series, window, valid, window.start, splitDate, 'IS').sort(bySharpeDescending);
    this.inSample = inSample.map((entry) => ({ params: entry.params, isMetrics: entry.metrics }));

    const top = inSample.slice(0, topN);
    logger.info(
      `[WalkForwardOptimizer] Phase 2 (out-of-sample) ${formatUtcDate(splitDate)} to ${formatUtcDate(window.end)} ` +
        `for top ${top.length} of ${inSample.length}`
    );

    const validated: OptimizationResult[] = [];
    for (const entry of top) {
      const oosMetrics = this.evaluate(series, window, entry.params, splitDate, window.end, 'OOS');
      if (oosMetrics) {
        validated.push({ params: entry.params, isMetrics: entry.metrics, oosMetrics });
      }
    }

    this.summary = {
      validationMode: 'walk_forward',
      totalCombinations,
      validCombinations: valid.length,
      combinationsTested: inSample.length,
      failedCombinations: valid.length - inSample.length,
      outOfSampleTested: validated.length,
      splitDate,
    };

    return validated;
  }

  /**
   * All in-sample runs finish before any out-of-sample run starts.
   */
  private runPhase(
    series: PriceSeries,
    window: LoadedWindow,
    combinations: ParameterConfiguration[],
    start: number,
    end: number,
    phase: string
  ): InSampleEntry[] {
    const entries: InSampleEntry[] = [];
    combinations.forEach((params, index) => {
      logger.debug(`[WalkForwardOptimizer] ${phase} ${index + 1}/${combinations.length}: ${describeParams(params)}`);
      const metrics = this.evaluate(series, window, params, start, end, phase);
      if (metrics) {
        entries.push({ params, metrics });
      }
    });
    return entries;
  }

  /**
   * One backtest. Per-combination failures are logged and yield null;
   * configuration errors abort the search.
   */
  private evaluate(
    series: PriceSeries,
    window: LoadedWindow,
    params: ParameterConfiguration,
    start: number,
    end: number,
    phase: string
  ): BacktestMetrics | null {
    try {
      const config = strategyConfigFromParameters(params, this.settings);
      const engine = new BacktestEngine({
        symbol: window.symbol,
        timeframe: window.timeframe,
        initialCapital: this.settings.initialCapital,
        maxHoldHours: config.maxHoldHours,
        stopLossPct: this.settings.stopLossPct,
        takeProfitPct: this.settings.takeProfitPct,
      });
      return engine.run(series, start, end, buildPipeline(config)).metrics;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      logger.warn(`[WalkForwardOptimizer] ${phase} skipped ${describeParams(params)}: ${errorMessage(error)}`);
      return null;
    }
  }

  private requireLoaded(): { series: PriceSeries; window: LoadedWindow } {
    if (!this.series || !this.window) {
      throw new ConfigurationError('No price series loaded; call loadOnce() before search()');
    }
    return { series: this.series, window: this.window };
  }
}
