import dotenv from 'dotenv';
import path from 'path';

// Load .env from root (works with CommonJS output)
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });

export type PriceDataSourceKind = 'csv' | 'postgres' | 'exchange' | 'mock';

const DATA_SOURCE_KINDS: readonly PriceDataSourceKind[] = ['csv', 'postgres', 'exchange', 'mock'];

export interface ResearchEngineConfig {
  databaseUrl: string;
  timezone: string;
  dataSource: PriceDataSourceKind;
  csvPath?: string;
  exchangeBaseUrl: string;
  exchangePageLimit: number;
  resultsDir: string;
}

function parseDataSource(raw: string | undefined): PriceDataSourceKind {
  const value = (raw || 'mock').trim().toLowerCase();
  const match = DATA_SOURCE_KINDS.find((kind) => kind === value);
  if (!match) {
    throw new Error(`PRICE_DATA_SOURCE must be one of ${DATA_SOURCE_KINDS.join(', ')} (got "${raw}")`);
  }
  return match;
}

export function getResearchEngineConfig(): ResearchEngineConfig {
  return {
    databaseUrl: process.env.DATABASE_URL || '',
    timezone: process.env.QS_TIMEZONE || 'UTC',
    dataSource: parseDataSource(process.env.PRICE_DATA_SOURCE),
    csvPath: process.env.PRICE_CSV_PATH,
    exchangeBaseUrl: process.env.EXCHANGE_BASE_URL || 'https://api.binance.com',
    exchangePageLimit: parseInt(process.env.EXCHANGE_PAGE_LIMIT || '1000', 10),
    resultsDir: process.env.RESULTS_DIR || 'results',
  };
}
