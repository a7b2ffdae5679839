import { PriceSeries } from '@quantsweep/shared-types';

/**
 * External price collaborator. Implementations own retry and pagination and
 * must return bars sorted ascending with unique timestamps.
 */
export interface PriceDataSource {
  readonly name: string;
  getSeries(symbol: string, timeframe: string, start: number, end: number): Promise<PriceSeries>;
}
