import { Pool, QueryResultRow } from 'pg';
import { Logger } from '@quantsweep/shared-utils';

export interface QueryRows {
  rows: QueryResultRow[];
}

/**
 * The slice of pg used by repositories. A Pool or PoolClient satisfies it.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryRows>;
}

export interface PooledClient extends Queryable {
  release(): void;
}

export interface ConnectionPool extends Queryable {
  connect(): Promise<PooledClient>;
  end(): Promise<void>;
}

export function createPool(databaseUrl: string, logger: Logger, context: string): Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: databaseUrl.includes('localhost') ? false : { rejectUnauthorized: false },
  });

  // Idle client errors must not crash a long sweep
  pool.on('error', (err) => {
    logger.error(`[${context}] Database pool error (non-fatal):`, err);
  });

  return pool;
}
