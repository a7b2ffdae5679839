/**
 * OptimizerResultStore - Stores optimization reports in PostgreSQL
 *
 * Manages tables:
 * - optimization_runs
 * - optimization_results
 */

import { Logger } from '@quantsweep/shared-utils';
import { ConnectionPool, createPool } from '../db/Queryable';
import { OptimizationReport } from './OptimizationTypes';

const logger = new Logger('OptimizerResultStore');

export class OptimizerResultStore {
  private pool: ConnectionPool | null;

  /**
   * Accepts a connection string or an already-built pool. Without either the
   * store logs a warning and every call is a no-op.
   */
  constructor(connection?: string | ConnectionPool) {
    if (typeof connection === 'string' && connection) {
      this.pool = createPool(connection, logger, 'OptimizerResultStore');
      logger.info('[OptimizerResultStore] Connected to Postgres for optimization results');
    } else if (connection && typeof connection !== 'string') {
      this.pool = connection;
    } else {
      this.pool = null;
      logger.warn('[OptimizerResultStore] No DATABASE_URL provided - results will not be stored in DB');
    }
  }

  get enabled(): boolean {
    return this.pool !== null;
  }

  async initializeTables(): Promise<void> {
    if (!this.pool) {
      logger.warn('[OptimizerResultStore] No database connection - skipping table creation');
      return;
    }

    try {
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS optimization_runs (
          id BIGSERIAL PRIMARY KEY,
          symbol TEXT NOT NULL,
          timeframe VARCHAR(8) NOT NULL,
          strategy TEXT NOT NULL,
          validation_mode VARCHAR(16) NOT NULL,
          start_date TIMESTAMPTZ NOT NULL,
          end_date TIMESTAMPTZ NOT NULL,
          split_date TIMESTAMPTZ,
          combinations_tested INTEGER NOT NULL,
          long_only BOOLEAN NOT NULL DEFAULT FALSE,
          created_at TIMESTAMPTZ DEFAULT NOW()
        )
      `);

      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS optimization_results (
          id BIGSERIAL PRIMARY KEY,
          run_id BIGINT REFERENCES optimization_runs(id) ON DELETE CASCADE,
          rank INTEGER NOT NULL,
          params JSONB NOT NULL,
          is_metrics JSONB NOT NULL,
          oos_metrics JSONB,
          robustness_factor DOUBLE PRECISION,
          degradation_ratio DOUBLE PRECISION,
          created_at TIMESTAMPTZ DEFAULT NOW()
        )
      `);

      await this.pool.query(`
        CREATE INDEX IF NOT EXISTS idx_optimization_runs_symbol ON optimization_runs(symbol, timeframe)
      `);
      await this.pool.query(`
        CREATE INDEX IF NOT EXISTS idx_optimization_results_run_id ON optimization_results(run_id)
      `);

      logger.info('[OptimizerResultStore] Database tables initialized');
    } catch (error) {
      logger.error('[OptimizerResultStore] Failed to initialize tables', error);
      throw error;
    }
  }

  /**
   * Save the run and its results in one transaction. Returns the run id, or 0
   * when there is no database.
   */
  async saveRun(report: OptimizationReport): Promise<number> {
    if (!this.pool) {
      logger.warn('[OptimizerResultStore] No database connection - skipping save');
      return 0;
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const { metadata } = report;
      const runResult = await client.query(
        `INSERT INTO optimization_runs (
          symbol, timeframe, strategy, validation_mode, start_date, end_date, split_date, combinations_tested, long_only
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
        RETURNING id`,
        [
          metadata.symbol,
          metadata.timeframe,
          metadata.strategy,
          metadata.validation_mode,
          metadata.start_date,
          metadata.end_date,
          metadata.split_date,
          metadata.total_combinations_tested,
          metadata.long_only,
        ]
      );
      const runId = Number(runResult.rows[0].id);

      for (const [index, result] of report.results.entries()) {
        await client.query(
          `INSERT INTO optimization_results (
            run_id, rank, params, is_metrics, oos_metrics, robustness_factor, degradation_ratio
          ) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [
            runId,
            index + 1,
            JSON.stringify(result.params),
            JSON.stringify(result.IS_metrics),
            result.OOS_metrics ? JSON.stringify(result.OOS_metrics) : null,
            result.robustness_factor ?? null,
            result.degradation_ratio ?? null,
          ]
        );
      }

      await client.query('COMMIT');
      logger.info(`[OptimizerResultStore] Saved run ${runId} with ${report.results.length} results`);
      return runId;
    } catch (error) {
      await client.query('ROLLBACK');
      logger.error('[OptimizerResultStore] Failed to save run, rolled back', error);
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      logger.info('[OptimizerResultStore] Database connection closed');
    }
  }
}
