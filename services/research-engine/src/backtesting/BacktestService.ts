/**
 * BacktestService - one strategy over one window, with optional trade persistence
 */

import { PriceSeries } from '@quantsweep/shared-types';
import { DataError, Logger, formatUtcDate } from '@quantsweep/shared-utils';
import { EngineSettings } from '../config';
import { PriceDataSource } from '../data/types';
import { assertPriceSeries } from '../data/validation';
import { AdxRegimeFilter, RegimeSummary } from '../filters';
import { timeframeToMilliseconds } from '../indicators';
import { buildPipeline, regimePolicyFor } from '../strategies/StrategyFactory';
import { StrategyConfig } from '../strategies/types';
import { BacktestEngine } from './BacktestEngine';
import { BacktestReport, TradeSink } from './types';

const logger = new Logger('BacktestService');

export interface BacktestWindow {
  symbol: string;
  timeframe: string;
  start: number; // epoch millis
  end: number;
}

export interface BacktestRunResult {
  report: BacktestReport;
  series: PriceSeries;
  runLabel: string;
}

export class BacktestService {
  constructor(
    private readonly dataSource: PriceDataSource,
    private readonly settings: Readonly<EngineSettings>,
    private readonly tradeSink?: TradeSink
  ) {}

  async run(config: StrategyConfig, window: BacktestWindow): Promise<BacktestRunResult> {
    const pipeline = buildPipeline({ ...config, longOnly: config.longOnly ?? this.settings.longOnly });
    const engine = new BacktestEngine({
      symbol: window.symbol,
      timeframe: window.timeframe,
      initialCapital: this.settings.initialCapital,
      maxHoldHours: config.maxHoldHours,
      stopLossPct: this.settings.stopLossPct,
      takeProfitPct: this.settings.takeProfitPct,
    });

    const bufferStart = window.start - this.settings.warmupBufferBars * timeframeToMilliseconds(window.timeframe);
    const series = await this.dataSource.getSeries(window.symbol, window.timeframe, bufferStart, window.end);
    assertPriceSeries(series, `${window.symbol} ${window.timeframe}`);
    if (series.length === 0) {
      throw new DataError(`No ${window.timeframe} data returned for ${window.symbol}`);
    }

    const report = engine.run(series, window.start, window.end, pipeline);
    const runLabel = `${pipeline.name} ${window.symbol} ${window.timeframe} ${formatUtcDate(window.start)}..${formatUtcDate(window.end)}`;

    logger.info(
      `[BacktestService] ${runLabel}: ${report.metrics.tradeCount} trades, ` +
        `return ${(report.metrics.totalReturn * 100).toFixed(2)}%, Sharpe ${report.metrics.sharpeRatio.toFixed(3)}`
    );

    if (this.tradeSink && report.trades.length > 0) {
      await this.tradeSink.saveTrades(runLabel, report.trades);
    }

    return { report, series, runLabel };
  }

  /**
   * Regime distribution the configured ADX filter sees over a series.
   */
  regimeSummary(config: StrategyConfig, series: PriceSeries): RegimeSummary | null {
    if (!config.regimeFilter) {
      return null;
    }
    const filter = new AdxRegimeFilter({
      ...config.regimeFilter,
      policy: config.regimeFilter.policy ?? regimePolicyFor(config.strategy.kind),
    });
    return filter.summarize(series);
  }
}
