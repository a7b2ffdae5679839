/**
 * OptimizationResultWriter - writes the JSON artifact atomically
 *
 * Writes to <path>.<pid>.tmp in the target directory, then renames over the
 * final path. A reader never observes a partial document.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { Logger, errorMessage } from '@quantsweep/shared-utils';
import { OptimizationReport } from './OptimizationTypes';

const logger = new Logger('OptimizationResultWriter');

/**
 * NaN and Infinity are not JSON; they are written as null.
 */
function finiteOrNull(_key: string, value: unknown): unknown {
  return typeof value === 'number' && !Number.isFinite(value) ? null : value;
}

export function serializeReport(report: OptimizationReport): string {
  return `${JSON.stringify(report, finiteOrNull, 2)}\n`;
}

export class OptimizationResultWriter {
  async write(report: OptimizationReport, targetPath: string): Promise<string> {
    const finalPath = path.resolve(targetPath);
    const tempPath = `${finalPath}.${process.pid}.tmp`;

    await fs.mkdir(path.dirname(finalPath), { recursive: true });

    try {
      await fs.writeFile(tempPath, serializeReport(report), 'utf8');
      await fs.rename(tempPath, finalPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      logger.error(`[OptimizationResultWriter] Failed to write ${finalPath}: ${errorMessage(error)}`);
      throw error;
    }

    logger.info(`[OptimizationResultWriter] Wrote ${report.results.length} results to ${finalPath}`);
    return finalPath;
  }
}

/**
 * results/optimization_BTC-USDT_1h_20240101T000000Z.json
 */
export function defaultReportPath(resultsDir: string, symbol: string, timeframe: string, timestamp: string): string {
  const safeSymbol = symbol.replace(/[^A-Za-z0-9]+/g, '-');
  const stamp = timestamp.replace(/[-:]/g, '').replace(/\.\d+/, '');
  return path.join(resultsDir, `optimization_${safeSymbol}_${timeframe}_${stamp}.json`);
}
