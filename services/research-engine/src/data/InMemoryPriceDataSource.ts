import { PriceSeries } from '@quantsweep/shared-types';
import { PriceDataSource } from './types';
import { sliceByTime } from './validation';

/**
 * Serves a preloaded series. Counts requests so callers can confirm a single load.
 */
export class InMemoryPriceDataSource implements PriceDataSource {
  readonly name = 'memory';
  private requests = 0;

  constructor(private readonly series: PriceSeries) {}

  get requestCount(): number {
    return this.requests;
  }

  async getSeries(_symbol: string, _timeframe: string, start: number, end: number): Promise<PriceSeries> {
    this.requests++;
    return sliceByTime(this.series, start, end);
  }
}
