import { ConfigurationError, Logger } from '@quantsweep/shared-utils';
import { ResearchEngineConfig } from '../config';
import { createPool } from '../db/Queryable';
import { CsvPriceDataSource } from './CsvPriceDataSource';
import { ExchangeKlineDataSource } from './ExchangeKlineDataSource';
import { PostgresPriceDataSource } from './PostgresPriceDataSource';
import { SyntheticPriceDataSource } from './SyntheticPriceDataSource';
import { PriceDataSource } from './types';

const logger = new Logger('PriceDataSource');

export function createPriceDataSource(
  config: Pick<ResearchEngineConfig, 'dataSource' | 'csvPath' | 'databaseUrl' | 'exchangeBaseUrl' | 'exchangePageLimit'>
): PriceDataSource {
  switch (config.dataSource) {
    case 'csv':
      if (!config.csvPath) {
        throw new ConfigurationError('PRICE_CSV_PATH is required for the csv data source');
      }
      return new CsvPriceDataSource(config.csvPath);
    case 'postgres':
      if (!config.databaseUrl) {
        throw new ConfigurationError('DATABASE_URL is required for the postgres data source');
      }
      return new PostgresPriceDataSource(createPool(config.databaseUrl, logger, 'PriceDataSource'));
    case 'exchange':
      return new ExchangeKlineDataSource({
        baseUrl: config.exchangeBaseUrl,
        pageLimit: config.exchangePageLimit,
      });
    case 'mock':
      return new SyntheticPriceDataSource();
    default: {
      const unknownSource: never = config.dataSource;
      throw new ConfigurationError(`Unsupported data source: ${String(unknownSource)}`);
    }
  }
}
