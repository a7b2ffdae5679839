#!/usr/bin/env node

/**
 * Optimization CLI
 *
 * Usage:
 *   npm run optimize -- --symbol BTC/USDT --timeframe 1h --start 2023-01-01 --end 2024-01-01 \
 *     --split 2023-09-01 --fast 5,10 --slow 20,50 --atr-window 14 --atr-multiplier 1.5,2
 *   npm run optimize -- --symbol BTC/USDT --timeframe 4h --start 2023-01-01 --end 2024-01-01 \
 *     --bb-window 20 --bb-std-dev 2,2.5
 */

import { Logger, QuantSweepError, errorMessage } from '@quantsweep/shared-utils';
import { ParsedArgs, flag, optionalInteger, optionalString, parseArgs, requireString } from '../cli/args';
import { DimensionName, ParameterRanges } from './OptimizationTypes';
import { OptimizationInvocation, OptimizerRunner } from './OptimizerRunner';
import { parseRange } from './ParameterSpace';

const logger = new Logger('OptimizeCLI');

export const RANGE_FLAGS: Record<string, DimensionName> = {
  fast: 'fastWindow',
  slow: 'slowWindow',
  'bb-window': 'bbWindow',
  'bb-std-dev': 'bbStdDev',
  'atr-window': 'atrWindow',
  'atr-multiplier': 'atrMultiplier',
  'adx-window': 'adxWindow',
  'adx-threshold': 'adxThreshold',
  'macd-fast': 'macdFast',
  'max-hold-hours': 'maxHoldHours',
};

export function rangesFromArgs(args: ParsedArgs): ParameterRanges {
  const ranges: ParameterRanges = {};
  for (const [flagName, dimension] of Object.entries(RANGE_FLAGS)) {
    const raw = optionalString(args, flagName);
    if (raw !== undefined) {
      ranges[dimension] = parseRange(raw, flagName);
    }
  }
  return ranges;
}

export function parseOptimizationArgs(argv: readonly string[]): OptimizationInvocation {
  const args = parseArgs(argv);
  return {
    symbol: requireString(args, 'symbol'),
    timeframe: requireString(args, 'timeframe'),
    start: requireString(args, 'start'),
    end: requireString(args, 'end'),
    split: optionalString(args, 'split'),
    topN: optionalInteger(args, 'top-n'),
    longOnly: args['long-only'] !== undefined ? flag(args, 'long-only') : undefined,
    output: optionalString(args, 'output'),
    saveDb: flag(args, 'save-db'),
    ranges: rangesFromArgs(args),
  };
}

function printHelp(): void {
  console.log(`
Walk-forward parameter optimization

Usage:
  npm run optimize -- [options]

Required:
  --symbol <s>            e.g. BTC/USDT
  --timeframe <tf>        e.g. 15m, 1h, 4h, 1d
  --start <date>          window start (YYYY-MM-DD, UTC)
  --end <date>            window end

Ranges (comma-separated):
  --fast, --slow          moving-average windows
  --bb-window, --bb-std-dev   Bollinger base (instead of fast/slow)
  --atr-window, --atr-multiplier
  --adx-window, --adx-threshold
  --macd-fast
  --max-hold-hours

Options:
  --split <date>          enable walk-forward validation at this date
  --top-n <n>             configurations validated out-of-sample (default 5)
  --long-only             rewrite SELL entries to NEUTRAL
  --output <file>         artifact path (default results/optimization_<symbol>_<tf>_<stamp>.json)
  --save-db               also store the run in Postgres (DATABASE_URL)
`);
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv.includes('--help') || argv.includes('-h')) {
    printHelp();
    return;
  }
  const invocation = parseOptimizationArgs(argv);
  const outcome = await new OptimizerRunner().run(invocation);

  console.log(`Results written to ${outcome.outputPath}`);
  if (outcome.recommendation) {
    console.log(JSON.stringify(outcome.recommendation.strategy, null, 2));
  }
}

if (require.main === module) {
  main()
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      if (error instanceof QuantSweepError) {
        logger.error(`[OptimizeCLI] ${error.name}: ${error.message}`);
      } else {
        logger.error(`[OptimizeCLI] Optimization failed: ${errorMessage(error)}`, error);
      }
      process.exit(1);
    });
}
