/**
 * ExchangeKlineDataSource - paginated OHLCV download from a Binance-style REST API
 *
 * GET {baseUrl}/api/v3/klines?symbol=BTCUSDT&interval=1h&startTime=..&endTime=..&limit=..
 * Each row: [openTime, open, high, low, close, volume, closeTime, ...]
 */

import axios, { AxiosInstance } from 'axios';
import { PriceBar, PriceSeries } from '@quantsweep/shared-types';
import { DataError, Logger, errorMessage } from '@quantsweep/shared-utils';
import { timeframeToMilliseconds } from '../indicators';
import { PriceDataSource } from './types';
import { normalizeBars } from './validation';

const logger = new Logger('ExchangeKlineDataSource');

export interface ExchangeKlineConfig {
  baseUrl: string;
  pageLimit?: number; // candles per request, default 1000
  maxRetries?: number; // per page, default 2
  retryDelayMs?: number; // linear backoff step, default 500
  timeoutMs?: number; // default 30000
  http?: AxiosInstance;
}

type KlinePrice = string | number;
type KlineRow = [number, KlinePrice, KlinePrice, KlinePrice, KlinePrice, KlinePrice, ...unknown[]];

function isKlineRow(value: unknown): value is KlineRow {
  return (
    Array.isArray(value) &&
    value.length >= 6 &&
    typeof value[0] === 'number' &&
    [1, 2, 3, 4, 5].every((i) => typeof value[i] === 'string' || typeof value[i] === 'number')
  );
}

/**
 * "BTC/USDT" -> "BTCUSDT"
 */
export function toExchangeSymbol(symbol: string): string {
  return symbol.replace(/[^A-Za-z0-9]/g, '').toUpperCase();
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ExchangeKlineDataSource implements PriceDataSource {
  readonly name = 'exchange';
  private readonly http: AxiosInstance;
  private readonly pageLimit: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(config: ExchangeKlineConfig) {
    this.http = config.http ?? axios.create({ baseURL: config.baseUrl, timeout: config.timeoutMs ?? 30000 });
    this.pageLimit = config.pageLimit ?? 1000;
    this.maxRetries = config.maxRetries ?? 2;
    this.retryDelayMs = config.retryDelayMs ?? 500;
  }

  async getSeries(symbol: string, timeframe: string, start: number, end: number): Promise<PriceSeries> {
    const stepMs = timeframeToMilliseconds(timeframe);
    const exchangeSymbol = toExchangeSymbol(symbol);
    const bars: PriceBar[] = [];
    let cursor = start;
    let pages = 0;

    logger.info(
      `[ExchangeKlineDataSource] Fetching ${exchangeSymbol} ${timeframe} from ${new Date(start).toISOString()} to ${new Date(end).toISOString()}`
    );

    while (cursor <= end) {
      const page = await this.fetchPage(exchangeSymbol, timeframe, cursor, end);
      pages++;
      if (page.length === 0) {
        break;
      }

      bars.push(...page);
      const lastOpen = page[page.length - 1].timestamp;
      if (page.length < this.pageLimit || lastOpen >= end) {
        break;
      }
      const next = lastOpen + stepMs;
      if (next <= cursor) {
        break;
      }
      cursor = next;
    }

    const series = normalizeBars(bars.filter((bar) => bar.timestamp >= start && bar.timestamp <= end));
    logger.info(`[ExchangeKlineDataSource] Loaded ${series.length} candles in ${pages} page(s)`);
    return series;
  }

  private async fetchPage(symbol: string, interval: string, startTime: number, endTime: number): Promise<PriceBar[]> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.http.get<unknown>('/api/v3/klines', {
          params: { symbol, interval, startTime, endTime, limit: this.pageLimit },
        });
        return this.parsePage(response.data);
      } catch (error) {
        if (error instanceof DataError) {
          throw error;
        }
        lastError = error;
        logger.warn(
          `[ExchangeKlineDataSource] Request failed (attempt ${attempt + 1}/${this.maxRetries + 1}): ${errorMessage(error)}`
        );
        if (attempt < this.maxRetries) {
          await delay(this.retryDelayMs * (attempt + 1));
        }
      }
    }

    throw new DataError(`Kline download failed for ${symbol} ${interval}: ${errorMessage(lastError)}`);
  }

  private parsePage(data: unknown): PriceBar[] {
    if (!Array.isArray(data)) {
      throw new DataError('Kline response is not an array');
    }
    return data.map((row: unknown, index): PriceBar => {
      if (!isKlineRow(row)) {
        throw new DataError(`Kline row ${index} is malformed`);
      }
      return {
        timestamp: row[0],
        open: Number(row[1]),
        high: Number(row[2]),
        low: Number(row[3]),
        close: Number(row[4]),
        volume: Number(row[5]),
      };
    });
  }
}
