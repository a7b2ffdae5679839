import { PriceSeries } from '@quantsweep/shared-types';
import { Logger, toUtcMillis } from '@quantsweep/shared-utils';
import { Queryable } from '../db/Queryable';
import { PriceDataSource } from './types';
import { normalizeBars } from './validation';

const logger = new Logger('PostgresPriceDataSource');

// NUMERIC columns arrive as strings
function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return parseFloat(value);
  return NaN;
}

/**
 * Reads the historical_candles table.
 */
export class PostgresPriceDataSource implements PriceDataSource {
  readonly name = 'postgres';

  constructor(private readonly db: Queryable) {}

  async getSeries(symbol: string, timeframe: string, start: number, end: number): Promise<PriceSeries> {
    const result = await this.db.query(
      `SELECT timestamp, open, high, low, close, volume
       FROM historical_candles
       WHERE symbol = $1
         AND timeframe = $2
         AND timestamp >= $3
         AND timestamp <= $4
       ORDER BY timestamp ASC`,
      [symbol, timeframe, new Date(start).toISOString(), new Date(end).toISOString()]
    );

    const bars = normalizeBars(
      result.rows.map((row) => ({
        timestamp: toUtcMillis(row.timestamp),
        open: toNumber(row.open),
        high: toNumber(row.high),
        low: toNumber(row.low),
        close: toNumber(row.close),
        volume: toNumber(row.volume) || 0,
      }))
    );

    logger.info(`[PostgresPriceDataSource] Loaded ${bars.length} ${timeframe} candles for ${symbol}`);
    return bars;
  }
}
