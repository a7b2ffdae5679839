/**
 * BacktestEngine - deterministic bar-by-bar simulation of one signal pipeline
 *
 * 1. Indicators and signals are computed over the whole buffered series.
 * 2. The first maxLookbackPeriod rows are dropped, even inside the window.
 * 3. The remainder is sliced to [requestedStart, requestedEnd] and walked.
 *
 * Exit priority per bar: STOP_LOSS > TAKE_PROFIT > MAX_HOLD_PERIOD > STRATEGY_SIGNAL.
 * Entries are only considered when no exit fired and the book is flat.
 */

import { ExitReason, PriceBar, PriceSeries, Trade } from '@quantsweep/shared-types';
import { ConfigurationError, DataError, Logger, formatUtcTimestamp } from '@quantsweep/shared-utils';
import { assertPriceSeries } from '../data/validation';
import { periodsPerYear } from '../indicators';
import { Signal, SignalPipeline } from '../strategies/types';
import { computeMetrics } from './metrics';
import { BacktestReport, BacktestSettings, PositionState } from './types';

const logger = new Logger('BacktestEngine');

const HOUR_MS = 60 * 60 * 1000;

interface ExitDecision {
  reason: ExitReason;
  price: number;
}

export class BacktestEngine {
  private readonly settings: BacktestSettings;
  private readonly maxHoldMs?: number;

  constructor(settings: BacktestSettings) {
    // Fail fast on an unknown timeframe, before any series is touched
    periodsPerYear(settings.timeframe);
    if (!(settings.initialCapital > 0)) {
      throw new ConfigurationError(`initialCapital must be positive (got ${settings.initialCapital})`);
    }
    if (settings.maxHoldHours !== undefined && !(settings.maxHoldHours > 0)) {
      throw new ConfigurationError(`maxHoldHours must be positive (got ${settings.maxHoldHours})`);
    }
    for (const key of ['stopLossPct', 'takeProfitPct'] as const) {
      const pct = settings[key];
      if (pct !== undefined && !(pct > 0 && pct < 1)) {
        throw new ConfigurationError(`${key} must be within (0, 1) (got ${pct})`);
      }
    }

    this.settings = { ...settings };
    this.maxHoldMs = settings.maxHoldHours !== undefined ? settings.maxHoldHours * HOUR_MS : undefined;
  }

  run(
    seriesWithBuffer: PriceSeries,
    requestedStart: number,
    requestedEnd: number,
    pipeline: SignalPipeline
  ): BacktestReport {
    if (requestedStart > requestedEnd) {
      throw new ConfigurationError('Backtest window start must not be after its end');
    }
    assertPriceSeries(seriesWithBuffer, `${this.settings.symbol} ${this.settings.timeframe}`);

    const lookback = pipeline.maxLookbackPeriod;
    if (seriesWithBuffer.length <= lookback) {
      throw new DataError(
        `Insufficient data for ${pipeline.name}: ${seriesWithBuffer.length} bars, lookback requires more than ${lookback}`
      );
    }

    const indicators = pipeline.calculateIndicators(seriesWithBuffer);
    const signals = pipeline.generateSignals(seriesWithBuffer, indicators);
    if (signals.length !== seriesWithBuffer.length) {
      throw new DataError(`${pipeline.name} produced ${signals.length} signals for ${seriesWithBuffer.length} bars`);
    }

    const droppedInWindow = seriesWithBuffer
      .slice(0, lookback)
      .filter((bar) => bar.timestamp >= requestedStart && bar.timestamp <= requestedEnd).length;
    logger.info(
      `[BacktestEngine] ${pipeline.name}: dropped ${lookback} warm-up bars` +
        (droppedInWindow > 0 ? ` (${droppedInWindow} inside the requested window)` : '')
    );

    let firstIndex = lookback;
    while (firstIndex < seriesWithBuffer.length && seriesWithBuffer[firstIndex].timestamp < requestedStart) {
      firstIndex++;
    }
    let lastIndex = seriesWithBuffer.length - 1;
    while (lastIndex >= firstIndex && seriesWithBuffer[lastIndex].timestamp > requestedEnd) {
      lastIndex--;
    }
    if (firstIndex > lastIndex) {
      throw new DataError(
        `No bars left in ${formatUtcTimestamp(requestedStart)} - ${formatUtcTimestamp(requestedEnd)} after warm-up for ${pipeline.name}`
      );
    }

    const trades: Trade[] = [];
    const equityCurve: number[] = [];
    let equity = 1;
    let position: PositionState | null = null;

    for (let i = firstIndex; i <= lastIndex; i++) {
      const bar = seriesWithBuffer[i];
      const signal = signals[i];

      if (position) {
        const exit = this.checkExit(position, bar, signal);
        if (exit) {
          const trade = this.closePosition(position, exit, bar.timestamp);
          trades.push(trade);
          equity *= 1 + trade.returnPct;
          position = null;
          equityCurve.push(equity);
          continue;
        }
      } else if (signal.value !== 'NEUTRAL') {
        position = this.openPosition(signal, bar, equity);
      }

      equityCurve.push(equity);
    }

    return {
      metrics: computeMetrics(equityCurve, trades.length, this.settings.timeframe),
      trades,
      warmupBarsDropped: lookback,
      barsEvaluated: lastIndex - firstIndex + 1,
      firstBarIndex: firstIndex,
      firstTimestamp: seriesWithBuffer[firstIndex].timestamp,
      lastTimestamp: seriesWithBuffer[lastIndex].timestamp,
      openPosition: position,
    };
  }

  private openPosition(signal: Signal, bar: PriceBar, equity: number): PositionState {
    const side = signal.value === 'BUY' ? 'long' : 'short';
    const sign = side === 'long' ? 1 : -1;
    const entryPrice = bar.close;
    const { stopLossPct, takeProfitPct } = this.settings;

    return {
      side,
      entryPrice,
      entryTimestamp: bar.timestamp,
      quantity: (this.settings.initialCapital * equity) / entryPrice,
      stopLossPrice:
        signal.stopLossPrice ?? (stopLossPct !== undefined ? entryPrice * (1 - sign * stopLossPct) : undefined),
      takeProfitPrice:
        signal.takeProfitPrice ?? (takeProfitPct !== undefined ? entryPrice * (1 + sign * takeProfitPct) : undefined),
    };
  }

  private checkExit(position: PositionState, bar: PriceBar, signal: Signal): ExitDecision | null {
    const isLong = position.side === 'long';
    const { stopLossPrice, takeProfitPrice } = position;

    // A gap through a level fills at the open
    if (stopLossPrice !== undefined) {
      if (isLong && bar.low <= stopLossPrice) {
        return { reason: 'STOP_LOSS', price: Math.min(bar.open, stopLossPrice) };
      }
      if (!isLong && bar.high >= stopLossPrice) {
        return { reason: 'STOP_LOSS', price: Math.max(bar.open, stopLossPrice) };
      }
    }

    if (takeProfitPrice !== undefined) {
      if (isLong && bar.high >= takeProfitPrice) {
        return { reason: 'TAKE_PROFIT', price: Math.max(bar.open, takeProfitPrice) };
      }
      if (!isLong && bar.low <= takeProfitPrice) {
        return { reason: 'TAKE_PROFIT', price: Math.min(bar.open, takeProfitPrice) };
      }
    }

    if (this.maxHoldMs !== undefined && bar.timestamp - position.entryTimestamp > this.maxHoldMs) {
      return { reason: 'MAX_HOLD_PERIOD', price: bar.close };
    }

    if ((isLong && signal.trigger === 'SELL') || (!isLong && signal.trigger === 'BUY')) {
      return { reason: 'STRATEGY_SIGNAL', price: bar.close };
    }

    return null;
  }

  private closePosition(position: PositionState, exit: ExitDecision, timestamp: number): Trade {
    const sign = position.side === 'long' ? 1 : -1;
    const move = exit.price - position.entryPrice;

    return {
      symbol: this.settings.symbol,
      side: position.side,
      entryPrice: position.entryPrice,
      exitPrice: exit.price,
      entryTimestamp: position.entryTimestamp,
      exitTimestamp: timestamp,
      quantity: position.quantity,
      pnl: sign * move * position.quantity,
      returnPct: (sign * move) / position.entryPrice,
      exitReason: exit.reason,
    };
  }
}
