// Market data types
export interface PriceBar {
  timestamp: number; // epoch millis, UTC, bar open time
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Ordered bars, strictly increasing timestamps. Shared read-only across evaluations.
 */
export type PriceSeries = readonly PriceBar[];

// Signal types
export type SignalValue = 'BUY' | 'SELL' | 'NEUTRAL';
export type EntryDirection = Exclude<SignalValue, 'NEUTRAL'>;

export type MarketRegime = 'TRENDING_UP' | 'TRENDING_DOWN' | 'RANGING';

// Trade types
export type TradeSide = 'long' | 'short';

export type ExitReason = 'STOP_LOSS' | 'TAKE_PROFIT' | 'MAX_HOLD_PERIOD' | 'STRATEGY_SIGNAL';

export const EXIT_REASONS: readonly ExitReason[] = [
  'STOP_LOSS',
  'TAKE_PROFIT',
  'MAX_HOLD_PERIOD',
  'STRATEGY_SIGNAL',
];

export interface Trade {
  symbol: string;
  side: TradeSide;
  entryPrice: number;
  exitPrice: number;
  entryTimestamp: number; // epoch millis
  exitTimestamp: number; // epoch millis
  quantity: number;
  pnl: number; // realized, quote currency
  returnPct: number; // fraction, e.g. 0.012 = +1.2%
  exitReason: ExitReason;
}

// Strategy kinds resolvable by the strategy factory
export type StrategyKind = 'sma_cross' | 'volatility_adjusted' | 'bollinger_band';

export type ValidationMode = 'walk_forward' | 'standard';
