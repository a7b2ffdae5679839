import { EXIT_REASONS, Trade } from '@quantsweep/shared-types';
import { DataError, Logger, formatUtcTimestamp, toUtcMillis } from '@quantsweep/shared-utils';
import { TradeSink } from '../backtesting/types';
import { Queryable } from './Queryable';

const logger = new Logger('TradeHistoryRepository');

export interface StoredTrade extends Trade {
  id: number;
  runLabel: string;
}

function toStoredTrade(row: Record<string, unknown>): StoredTrade {
  const side = row.side;
  const exitReason = EXIT_REASONS.find((reason) => reason === row.exit_reason);
  if ((side !== 'long' && side !== 'short') || !exitReason) {
    throw new DataError(`backtest_trades row ${String(row.id)} has an unknown side or exit reason`);
  }
  return {
    id: Number(row.id),
    runLabel: String(row.run_label),
    symbol: String(row.symbol),
    side,
    entryPrice: Number(row.entry_price),
    exitPrice: Number(row.exit_price),
    entryTimestamp: toUtcMillis(row.entry_time),
    exitTimestamp: toUtcMillis(row.exit_time),
    quantity: Number(row.quantity),
    pnl: Number(row.pnl),
    returnPct: Number(row.return_pct),
    exitReason,
  };
}

/**
 * TradeHistoryRepository
 *
 * Persists closed backtest trades to backtest_trades.
 */
export class TradeHistoryRepository implements TradeSink {
  private readonly db: Queryable | null;

  constructor(db?: Queryable) {
    this.db = db ?? null;
    if (!this.db) {
      logger.warn('[TradeHistoryRepository] No database configured, repository is disabled');
    }
  }

  private ensureDb(): Queryable {
    if (!this.db) {
      throw new Error('[TradeHistoryRepository] Database pool not initialized');
    }
    return this.db;
  }

  async initializeTable(): Promise<void> {
    const db = this.ensureDb();
    await db.query(`
      CREATE TABLE IF NOT EXISTS backtest_trades (
        id BIGSERIAL PRIMARY KEY,
        run_label TEXT NOT NULL,
        symbol TEXT NOT NULL,
        side VARCHAR(5) NOT NULL,
        entry_price DOUBLE PRECISION NOT NULL,
        exit_price DOUBLE PRECISION NOT NULL,
        entry_time TIMESTAMPTZ NOT NULL,
        exit_time TIMESTAMPTZ NOT NULL,
        quantity DOUBLE PRECISION NOT NULL,
        pnl DOUBLE PRECISION NOT NULL,
        return_pct DOUBLE PRECISION NOT NULL,
        exit_reason VARCHAR(32) NOT NULL,
        created_at TIMESTAMPTZ DEFAULT NOW()
      )
    `);
  }

  /**
   * Insert all trades of one run with a single multi-row INSERT.
   */
  async saveTrades(runLabel: string, trades: readonly Trade[]): Promise<void> {
    if (trades.length === 0) {
      return;
    }
    const db = this.ensureDb();

    const columns = 11;
    const placeholders: string[] = [];
    const values: unknown[] = [];
    trades.forEach((trade, index) => {
      const base = index * columns;
      placeholders.push(`(${Array.from({ length: columns }, (_, i) => `$${base + i + 1}`).join(', ')})`);
      values.push(
        runLabel,
        trade.symbol,
        trade.side,
        trade.entryPrice,
        trade.exitPrice,
        formatUtcTimestamp(trade.entryTimestamp),
        formatUtcTimestamp(trade.exitTimestamp),
        trade.quantity,
        trade.pnl,
        trade.returnPct,
        trade.exitReason
      );
    });

    await db.query(
      `INSERT INTO backtest_trades (
         run_label, symbol, side, entry_price, exit_price, entry_time, exit_time,
         quantity, pnl, return_pct, exit_reason
       ) VALUES ${placeholders.join(', ')}`,
      values
    );
    logger.info(`[TradeHistoryRepository] Saved ${trades.length} trades for ${runLabel}`);
  }

  async getTradesForRun(runLabel: string): Promise<StoredTrade[]> {
    const db = this.ensureDb();
    const result = await db.query(
      `SELECT * FROM backtest_trades WHERE run_label = $1 ORDER BY entry_time ASC`,
      [runLabel]
    );
    return result.rows.map(toStoredTrade);
  }
}
