export * from './types';
export * from './validation';
export * from './CsvPriceDataSource';
export * from './PostgresPriceDataSource';
export * from './ExchangeKlineDataSource';
export * from './InMemoryPriceDataSource';
export * from './SyntheticPriceDataSource';
export * from './createPriceDataSource';
