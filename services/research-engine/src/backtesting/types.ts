/**
 * Backtesting Types
 */

import { Trade, TradeSide } from '@quantsweep/shared-types';

export interface BacktestSettings {
  symbol: string;
  timeframe: string; // e.g. '1h', '4h', '1d'
  initialCapital: number;
  maxHoldHours?: number; // force-close after this long, regardless of price
  stopLossPct?: number; // fallback stop when the signal carries none, e.g. 0.02
  takeProfitPct?: number; // fallback target when the signal carries none, e.g. 0.04
}

/**
 * The single open position. Flat is represented by null.
 */
export interface PositionState {
  side: TradeSide;
  entryPrice: number;
  entryTimestamp: number; // epoch millis
  quantity: number;
  stopLossPrice?: number;
  takeProfitPrice?: number;
}

export interface BacktestMetrics {
  totalReturn: number; // fraction, 0.15 = +15%
  sharpeRatio: number; // annualized
  maxDrawdown: number; // <= 0, fraction of running peak
  equityCurve: number[]; // realized equity multiplier, one value per evaluated bar
  tradeCount: number;
}

export interface BacktestReport {
  metrics: BacktestMetrics;
  trades: Trade[];
  warmupBarsDropped: number;
  barsEvaluated: number;
  firstBarIndex: number; // index into the buffered series
  firstTimestamp: number;
  lastTimestamp: number;
  openPosition: PositionState | null; // still open at the window end, not counted as a trade
}

/**
 * Optional persistence collaborator for closed trades.
 */
export interface TradeSink {
  saveTrades(runLabel: string, trades: readonly Trade[]): Promise<void>;
}
