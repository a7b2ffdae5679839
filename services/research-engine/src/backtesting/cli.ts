#!/usr/bin/env node

/**
 * CLI entry point for single backtests
 *
 * Usage:
 *   npm run backtest -- --symbol BTC/USDT --timeframe 1h --start 2024-01-01 --end 2024-06-30 \
 *     --strategy sma_cross --fast 10 --slow 50
 *   npm run backtest -- --symbol BTC/USDT --timeframe 1h --start 2024-01-01 --end 2024-06-30 \
 *     --strategy volatility_adjusted --fast 10 --slow 50 --atr-window 14 --atr-multiplier 2 \
 *     --adx-window 14 --adx-threshold 25 --regime
 */

import { StrategyKind } from '@quantsweep/shared-types';
import {
  ConfigurationError,
  Logger,
  QuantSweepError,
  ValidationError,
  errorMessage,
  parseUtcDate,
} from '@quantsweep/shared-utils';
import { ParsedArgs, flag, optionalNumber, parseArgs, requireString } from '../cli/args';
import { getConfig } from '../config';
import { createPriceDataSource } from '../data/createPriceDataSource';
import { createPool } from '../db/Queryable';
import { TradeHistoryRepository } from '../db/TradeHistoryRepository';
import { isStrategyKind } from '../strategies/StrategyFactory';
import { StrategyConfig, StrategySpec } from '../strategies/types';
import { BacktestService, BacktestWindow } from './BacktestService';
import { BacktestReport } from './types';

const logger = new Logger('BacktestCLI');

function requireNumber(args: ParsedArgs, key: string, kind: StrategyKind): number {
  const value = optionalNumber(args, key);
  if (value === undefined) {
    throw new ValidationError(`--${key} is required for ${kind}`, key);
  }
  return value;
}

export function strategySpecFromArgs(args: ParsedArgs): StrategySpec {
  const kind = requireString(args, 'strategy');
  if (!isStrategyKind(kind)) {
    throw new ValidationError(`Unknown strategy "${kind}" (sma_cross, volatility_adjusted, bollinger_band)`, 'strategy');
  }

  switch (kind) {
    case 'sma_cross':
      return { kind, fastWindow: requireNumber(args, 'fast', kind), slowWindow: requireNumber(args, 'slow', kind) };
    case 'volatility_adjusted':
      return {
        kind,
        fastWindow: requireNumber(args, 'fast', kind),
        slowWindow: requireNumber(args, 'slow', kind),
        atrWindow: requireNumber(args, 'atr-window', kind),
        atrMultiplier: requireNumber(args, 'atr-multiplier', kind),
        riskRewardRatio: optionalNumber(args, 'risk-reward'),
      };
    case 'bollinger_band':
      return {
        kind,
        bbWindow: requireNumber(args, 'bb-window', kind),
        bbStdDev: requireNumber(args, 'bb-std-dev', kind),
        atrWindow: optionalNumber(args, 'atr-window'),
        atrMultiplier: optionalNumber(args, 'atr-multiplier'),
      };
    default: {
      const unknownKind: never = kind;
      throw new ConfigurationError(`Unsupported strategy ${String(unknownKind)}`);
    }
  }
}

export function strategyConfigFromArgs(args: ParsedArgs, macd: { macdSlow: number; macdSignal: number }): StrategyConfig {
  const config: StrategyConfig = { strategy: strategySpecFromArgs(args) };
  if (args['long-only'] !== undefined) {
    config.longOnly = flag(args, 'long-only');
  }

  const adxWindow = optionalNumber(args, 'adx-window');
  const adxThreshold = optionalNumber(args, 'adx-threshold');
  if ((adxWindow === undefined) !== (adxThreshold === undefined)) {
    throw new ValidationError('--adx-window and --adx-threshold must be supplied together', 'adx-window');
  }
  if (adxWindow !== undefined && adxThreshold !== undefined) {
    config.regimeFilter = { adxWindow, adxThreshold };
  }

  const macdFast = optionalNumber(args, 'macd-fast');
  if (macdFast !== undefined) {
    config.momentumFilter = { macdFast, macdSlow: macd.macdSlow, macdSignal: macd.macdSignal };
  }

  const maxHoldHours = optionalNumber(args, 'max-hold-hours');
  if (maxHoldHours !== undefined) {
    config.maxHoldHours = maxHoldHours;
  }
  return config;
}

export function formatBacktestSummary(label: string, report: BacktestReport): string[] {
  const { metrics } = report;
  const lines = [
    '='.repeat(60),
    `Backtest: ${label}`,
    '='.repeat(60),
    `Bars evaluated:   ${report.barsEvaluated} (warm-up dropped: ${report.warmupBarsDropped})`,
    `Trades:           ${metrics.tradeCount}`,
    `Total return:     ${(metrics.totalReturn * 100).toFixed(2)}%`,
    `Sharpe ratio:     ${metrics.sharpeRatio.toFixed(3)}`,
    `Max drawdown:     ${(metrics.maxDrawdown * 100).toFixed(2)}%`,
  ];
  if (report.openPosition) {
    lines.push(`Open position:    ${report.openPosition.side} @ ${report.openPosition.entryPrice}`);
  }
  return lines;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = getConfig();
  const window: BacktestWindow = {
    symbol: requireString(args, 'symbol'),
    timeframe: requireString(args, 'timeframe'),
    start: parseUtcDate(requireString(args, 'start')),
    end: parseUtcDate(requireString(args, 'end')),
  };
  const strategyConfig = strategyConfigFromArgs(args, config.engine);

  const pool = flag(args, 'save-db') && config.databaseUrl ? createPool(config.databaseUrl, logger, 'BacktestCLI') : null;
  const repository = pool ? new TradeHistoryRepository(pool) : undefined;

  try {
    await repository?.initializeTable();
    const service = new BacktestService(createPriceDataSource(config), config.engine, repository);
    const { report, series, runLabel } = await service.run(strategyConfig, window);

    for (const line of formatBacktestSummary(runLabel, report)) {
      console.log(line);
    }

    if (flag(args, 'regime')) {
      const summary = service.regimeSummary(strategyConfig, series);
      console.log(summary ? JSON.stringify(summary, null, 2) : 'No regime filter configured (--adx-window/--adx-threshold)');
    }
  } finally {
    await pool?.end();
  }
}

if (require.main === module) {
  main()
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      if (error instanceof QuantSweepError) {
        logger.error(`[BacktestCLI] ${error.name}: ${error.message}`);
      } else {
        logger.error(`[BacktestCLI] Backtest failed: ${errorMessage(error)}`, error);
      }
      process.exit(1);
    });
}
