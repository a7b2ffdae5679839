/**
 * CsvPriceDataSource - OHLCV candles from a CSV file
 *
 * Expected columns: timestamp,open,high,low,close,volume (header optional).
 * Timestamps may be epoch seconds, epoch millis or ISO 8601 (UTC unless an offset is given).
 */

import * as fs from 'fs/promises';
import { PriceBar, PriceSeries } from '@quantsweep/shared-types';
import { DataError, Logger, errorMessage, toUtcMillis } from '@quantsweep/shared-utils';
import { PriceDataSource } from './types';
import { isPlausibleBar, normalizeBars } from './validation';

const logger = new Logger('CsvPriceDataSource');

export function parseCsvTimestamp(raw: string): number {
  if (/^\d+$/.test(raw)) {
    const value = parseInt(raw, 10);
    // Ten digits or fewer means seconds
    return value < 10_000_000_000 ? value * 1000 : value;
  }
  return toUtcMillis(raw);
}

export function parseCsvBars(content: string): { bars: PriceBar[]; skipped: number } {
  const lines = content.split(/\r?\n/).filter((line) => line.trim());
  // Data rows start with a digit (epoch or ISO date); anything else is a header
  const startIndex = lines.length > 0 && !/^\d/.test(lines[0].trim()) ? 1 : 0;

  const bars: PriceBar[] = [];
  let skipped = 0;

  for (let i = startIndex; i < lines.length; i++) {
    const parts = lines[i].split(',').map((part) => part.trim());
    if (parts.length < 6) {
      skipped++;
      continue;
    }

    const bar: PriceBar = {
      timestamp: parseCsvTimestamp(parts[0]),
      open: parseFloat(parts[1]),
      high: parseFloat(parts[2]),
      low: parseFloat(parts[3]),
      close: parseFloat(parts[4]),
      volume: parseFloat(parts[5]) || 0,
    };

    if (!Number.isFinite(bar.timestamp) || !isPlausibleBar(bar)) {
      skipped++;
      continue;
    }
    bars.push(bar);
  }

  return { bars, skipped };
}

export class CsvPriceDataSource implements PriceDataSource {
  readonly name = 'csv';

  constructor(private readonly csvPath: string) {}

  async getSeries(symbol: string, timeframe: string, start: number, end: number): Promise<PriceSeries> {
    let content: string;
    try {
      content = await fs.readFile(this.csvPath, 'utf-8');
    } catch (error) {
      throw new DataError(`Failed to read CSV ${this.csvPath}: ${errorMessage(error)}`);
    }

    const { bars, skipped } = parseCsvBars(content);
    if (skipped > 0) {
      logger.warn(`[CsvPriceDataSource] Skipped ${skipped} malformed or implausible rows in ${this.csvPath}`);
    }

    const inRange = normalizeBars(bars.filter((bar) => bar.timestamp >= start && bar.timestamp <= end));
    logger.info(`[CsvPriceDataSource] Loaded ${inRange.length} ${timeframe} candles for ${symbol} from CSV`);
    return inRange;
  }
}
