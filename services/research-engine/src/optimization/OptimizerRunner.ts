/**
 * OptimizerRunner - wires config, data, search, ranking and persistence for one run
 */

import { Logger, parseUtcDate } from '@quantsweep/shared-utils';
import { RankedResult, Recommendation, RobustnessAnalyzer } from '../analysis/RobustnessAnalyzer';
import { ResearchEngineConfig, createEngineSettings, getConfig } from '../config';
import { createPriceDataSource } from '../data/createPriceDataSource';
import { PriceDataSource } from '../data/types';
import { OptimizationReport, OptimizationResult, ParameterRanges } from './OptimizationTypes';
import { buildOptimizationReport, strategyKindForLayout } from './OptimizationReport';
import { OptimizationResultWriter, defaultReportPath } from './OptimizationResultWriter';
import { OptimizerResultStore } from './OptimizerResultStore';
import { detectDimensions } from './ParameterSpace';
import { WalkForwardOptimizer, assertSearchWindow, assertTopN } from './WalkForwardOptimizer';

const logger = new Logger('OptimizerRunner');

export interface OptimizationInvocation {
  symbol: string;
  timeframe: string;
  start: string; // ISO date, UTC
  end: string;
  split?: string;
  topN?: number;
  longOnly?: boolean;
  output?: string;
  saveDb?: boolean;
  ranges: ParameterRanges;
}

export interface OptimizationRunOutcome {
  report: OptimizationReport;
  outputPath: string;
  recommendation: Recommendation | null;
  runId?: number;
}

export interface OptimizerRunnerDeps {
  config?: ResearchEngineConfig;
  dataSource?: PriceDataSource;
  writer?: OptimizationResultWriter;
  store?: OptimizerResultStore;
}

export class OptimizerRunner {
  private readonly config: ResearchEngineConfig;
  private readonly dataSource: PriceDataSource;
  private readonly writer: OptimizationResultWriter;
  private readonly store?: OptimizerResultStore;

  constructor(deps: OptimizerRunnerDeps = {}) {
    this.config = deps.config ?? getConfig();
    this.dataSource = deps.dataSource ?? createPriceDataSource(this.config);
    this.writer = deps.writer ?? new OptimizationResultWriter();
    this.store = deps.store;
  }

  async run(invocation: OptimizationInvocation): Promise<OptimizationRunOutcome> {
    const start = parseUtcDate(invocation.start);
    const end = parseUtcDate(invocation.end);
    const splitDate = invocation.split ? parseUtcDate(invocation.split) : undefined;
    const settings = createEngineSettings({
      ...this.config.engine,
      longOnly: invocation.longOnly ?? this.config.engine.longOnly,
    });
    const topN = invocation.topN ?? settings.defaultTopN;

    // Reject a bad invocation before any data is fetched
    detectDimensions(invocation.ranges);
    assertTopN(topN);
    assertSearchWindow(start, end, splitDate);

    logger.info(`[OptimizerRunner] Starting optimization`, {
      symbol: invocation.symbol,
      timeframe: invocation.timeframe,
      start: invocation.start,
      end: invocation.end,
      split: invocation.split ?? null,
      dataSource: this.dataSource.name,
    });

    const optimizer = new WalkForwardOptimizer(settings);
    await optimizer.loadOnce(this.dataSource, invocation.symbol, invocation.timeframe, start, end);
    const results = optimizer.search(invocation.ranges, splitDate, topN);

    const summary = optimizer.lastRunSummary;
    const layout = optimizer.lastLayout;
    if (!summary || !layout) {
      throw new Error('[OptimizerRunner] Search finished without a summary');
    }

    const macd = layout.dimensions.includes('macdFast')
      ? { macdSlow: settings.macdSlow, macdSignal: settings.macdSignal }
      : {};

    let ordered: OptimizationResult[] = results;
    let recommendation: Recommendation | null = null;
    const analyzer = new RobustnessAnalyzer({ epsilon: settings.robustnessEpsilon });
    if (splitDate !== undefined) {
      const ranked: RankedResult[] = analyzer.rank(results);
      ordered = ranked;
      recommendation = analyzer.recommend(ranked, {
        symbol: invocation.symbol,
        timeframe: invocation.timeframe,
        longOnly: settings.longOnly,
        ...macd,
      });
      for (const line of analyzer.formatReport(ranked)) {
        logger.info(`[OptimizerRunner] ${line}`);
      }
    }

    const report = buildOptimizationReport(ordered, summary, {
      symbol: invocation.symbol,
      timeframe: invocation.timeframe,
      start,
      end,
      splitDate,
      strategy: strategyKindForLayout(layout),
      longOnly: settings.longOnly,
      ...macd,
    });

    const target =
      invocation.output ??
      defaultReportPath(this.config.resultsDir, invocation.symbol, invocation.timeframe, report.metadata.timestamp);
    const outputPath = await this.writer.write(report, target);

    let runId: number | undefined;
    if (invocation.saveDb) {
      const store = this.store ?? new OptimizerResultStore(this.config.databaseUrl);
      try {
        await store.initializeTables();
        runId = await store.saveRun(report);
      } finally {
        await store.close();
      }
    }

    if (recommendation) {
      logger.info('[OptimizerRunner] Recommended configuration', recommendation.strategy);
    } else if (splitDate !== undefined) {
      logger.warn('[OptimizerRunner] No validated configuration to recommend');
    }
    logger.info(
      `[OptimizerRunner] Done: ${summary.combinationsTested}/${summary.validCombinations} combinations tested, ` +
        `${report.results.length} results written to ${outputPath}`
    );

    return { report, outputPath, recommendation, runId };
  }
}
