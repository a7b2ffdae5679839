#!/usr/bin/env node

/**
 * Robustness analysis CLI
 *
 * Usage:
 *   npm run analyze -- --input results/optimization_BTC-USDT_1h_20240101T000000Z.json --top 10
 */

import { Logger, QuantSweepError, ValidationError, errorMessage } from '@quantsweep/shared-utils';
import { optionalInteger, parseArgs, requireString } from '../cli/args';
import { getConfig } from '../config';
import { fromArtifactResult, readOptimizationReport } from '../optimization/OptimizationReport';
import { RobustnessAnalyzer } from './RobustnessAnalyzer';

const logger = new Logger('AnalyzeCLI');

export interface AnalysisOutput {
  lines: string[];
  recommendationJson: string | null;
}

export async function analyzeReportFile(inputPath: string, top: number, epsilon: number): Promise<AnalysisOutput> {
  const report = await readOptimizationReport(inputPath);
  if (report.metadata.validation_mode !== 'walk_forward') {
    throw new ValidationError(`${inputPath} has no out-of-sample results; re-run the optimizer with --split`, 'input');
  }

  const analyzer = new RobustnessAnalyzer({ epsilon });
  const ranked = analyzer.rank(report.results.map(fromArtifactResult));
  const { metadata } = report;
  const recommendation = analyzer.recommend(ranked, {
    symbol: metadata.symbol,
    timeframe: metadata.timeframe,
    longOnly: metadata.long_only,
    macdSlow: metadata.macd_slow ?? undefined,
    macdSignal: metadata.macd_signal ?? undefined,
  });

  const lines = [
    `Loaded ${report.results.length} configurations (${report.metadata.symbol} ${report.metadata.timeframe})`,
    `In-sample: ${report.metadata.in_sample_period}`,
    `Out-of-sample: ${report.metadata.out_of_sample_period ?? 'n/a'}`,
    '',
    ...analyzer.formatReport(ranked, top),
  ];

  return {
    lines,
    recommendationJson: recommendation ? JSON.stringify(recommendation.strategy, null, 2) : null,
  };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const input = requireString(args, 'input');
  const top = optionalInteger(args, 'top') ?? 5;
  if (top < 1) {
    throw new ValidationError('--top must be at least 1', 'top');
  }

  const { engine } = getConfig();
  const output = await analyzeReportFile(input, top, engine.robustnessEpsilon);
  for (const line of output.lines) {
    console.log(line);
  }
  if (output.recommendationJson) {
    console.log('\nRecommended strategy configuration:');
    console.log(output.recommendationJson);
  } else {
    console.log('\nNo valid results to analyze.');
  }
}

if (require.main === module) {
  main()
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      if (error instanceof QuantSweepError) {
        logger.error(`[AnalyzeCLI] ${error.name}: ${error.message}`);
      } else {
        logger.error(`[AnalyzeCLI] Analysis failed: ${errorMessage(error)}`, error);
      }
      process.exit(1);
    });
}
