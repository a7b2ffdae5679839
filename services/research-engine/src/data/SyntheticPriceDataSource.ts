import { PriceBar, PriceSeries } from '@quantsweep/shared-types';
import { Logger } from '@quantsweep/shared-utils';
import { timeframeToMilliseconds } from '../indicators';
import { PriceDataSource } from './types';

const logger = new Logger('SyntheticPriceDataSource');

export interface SyntheticSeriesConfig {
  seed?: number;
  startPrice?: number;
  volatility?: number; // per-bar return std, e.g. 0.01
  drift?: number; // per-bar mean return
}

/**
 * mulberry32: small deterministic PRNG returning values in [0, 1)
 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seeded random walk for dry runs without market data. Same seed, same bars.
 */
export class SyntheticPriceDataSource implements PriceDataSource {
  readonly name = 'mock';

  constructor(private readonly config: SyntheticSeriesConfig = {}) {}

  async getSeries(symbol: string, timeframe: string, start: number, end: number): Promise<PriceSeries> {
    const stepMs = timeframeToMilliseconds(timeframe);
    const random = createRandom(this.config.seed ?? 42);
    const volatility = this.config.volatility ?? 0.01;
    const drift = this.config.drift ?? 0;
    const bars: PriceBar[] = [];

    let price = this.config.startPrice ?? 100;
    const first = Math.ceil(start / stepMs) * stepMs;

    for (let timestamp = first; timestamp <= end; timestamp += stepMs) {
      const open = price;
      const change = drift + volatility * (random() * 2 - 1);
      const close = Math.max(open * (1 + change), 0.01);
      const wick = Math.abs(close - open) * random() + open * volatility * 0.25 * random();
      bars.push({
        timestamp,
        open,
        high: Math.max(open, close) + wick,
        low: Math.max(Math.min(open, close) - wick, 0.001),
        close,
        volume: Math.round(1000 + 9000 * random()),
      });
      price = close;
    }

    logger.info(`[SyntheticPriceDataSource] Generated ${bars.length} ${timeframe} candles for ${symbol}`);
    return bars;
  }
}
