/**
 * Optimization report (JSON artifact): build from search results, read back for analysis.
 */

import { promises as fs } from 'fs';
import { StrategyKind, ValidationMode } from '@quantsweep/shared-types';
import { DataError, errorMessage, formatUtcDate, formatUtcTimestamp } from '@quantsweep/shared-utils';
import { BacktestMetrics } from '../backtesting/types';
import {
  ArtifactMetadata,
  ArtifactMetrics,
  ArtifactResult,
  DimensionLayout,
  OptimizationReport,
  OptimizationResult,
  SearchSummary,
} from './OptimizationTypes';
import { fromArtifactParams, toArtifactParams } from './ParameterSpace';

export interface ReportContext {
  symbol: string;
  timeframe: string;
  start: number;
  end: number;
  splitDate?: number;
  strategy: string;
  longOnly?: boolean;
  macdSlow?: number; // only when macd_fast is a searched dimension
  macdSignal?: number;
  generatedAt?: string; // ISO timestamp, defaults to now
}

const DAY_MS = 24 * 60 * 60 * 1000;

// Midnight boundaries print as YYYY-MM-DD, intraday ones as a full UTC timestamp
export function formatBoundary(epochMs: number): string {
  return epochMs % DAY_MS === 0 ? formatUtcDate(epochMs) : formatUtcTimestamp(epochMs);
}

/**
 * The strategy a dimension layout parameterizes.
 */
export function strategyKindForLayout(layout: DimensionLayout): StrategyKind {
  if (layout.family === 'bollinger') {
    return 'bollinger_band';
  }
  return layout.dimensions.includes('atrWindow') ? 'volatility_adjusted' : 'sma_cross';
}

export function toArtifactMetrics(metrics: BacktestMetrics): ArtifactMetrics {
  return {
    total_return: metrics.totalReturn,
    sharpe_ratio: metrics.sharpeRatio,
    max_drawdown: metrics.maxDrawdown,
    trade_count: metrics.tradeCount,
  };
}

export function toArtifactResult(result: OptimizationResult): ArtifactResult {
  const artifact: ArtifactResult = {
    params: toArtifactParams(result.params),
    IS_metrics: toArtifactMetrics(result.isMetrics),
  };
  if (result.oosMetrics) {
    artifact.OOS_metrics = toArtifactMetrics(result.oosMetrics);
  }
  if (result.robustnessFactor !== undefined) {
    artifact.robustness_factor = result.robustnessFactor;
  }
  if (result.degradationRatio !== undefined) {
    artifact.degradation_ratio = result.degradationRatio;
  }
  return artifact;
}

export function buildOptimizationReport(
  results: readonly OptimizationResult[],
  summary: SearchSummary,
  context: ReportContext
): OptimizationReport {
  const startDate = formatBoundary(context.start);
  const endDate = formatBoundary(context.end);
  const splitDate = context.splitDate !== undefined ? formatBoundary(context.splitDate) : null;

  const metadata: ArtifactMetadata = {
    timestamp: context.generatedAt ?? formatUtcTimestamp(Date.now()),
    symbol: context.symbol,
    timeframe: context.timeframe,
    start_date: startDate,
    end_date: endDate,
    split_date: splitDate,
    validation_mode: summary.validationMode,
    in_sample_period: `${startDate} to ${splitDate ?? endDate}`,
    out_of_sample_period: splitDate ? `${splitDate} to ${endDate}` : null,
    total_combinations_tested: summary.combinationsTested,
    strategy: context.strategy,
    long_only: context.longOnly ?? false,
    macd_slow: context.macdSlow ?? null,
    macd_signal: context.macdSignal ?? null,
  };

  return { metadata, results: results.map(toArtifactResult) };
}

// Reading

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function requireString(record: JsonRecord, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new DataError(`${where}.${key} must be a string`);
  }
  return value;
}

function optionalString(record: JsonRecord, key: string, where: string): string | null {
  const value = record[key];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new DataError(`${where}.${key} must be a string or null`);
  }
  return value;
}

function optionalNumber(record: JsonRecord, key: string, where: string): number | null {
  const value = record[key];
  if (value === null || value === undefined) {
    return null;
  }
  if (!isFiniteNumber(value)) {
    throw new DataError(`${where}.${key} must be a number or null`);
  }
  return value;
}

// Artifacts written before the flag existed were never long-only
function optionalBoolean(record: JsonRecord, key: string, where: string): boolean {
  const value = record[key];
  if (value === undefined) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new DataError(`${where}.${key} must be a boolean`);
  }
  return value;
}

function isValidationMode(value: string): value is ValidationMode {
  return value === 'walk_forward' || value === 'standard';
}

function parseMetrics(raw: unknown, where: string): ArtifactMetrics {
  if (!isRecord(raw)) {
    throw new DataError(`${where} must be an object`);
  }
  const { total_return, sharpe_ratio, max_drawdown, trade_count } = raw;
  if (!isFiniteNumber(total_return) || !isFiniteNumber(sharpe_ratio) || !isFiniteNumber(max_drawdown)) {
    throw new DataError(`${where} needs numeric total_return, sharpe_ratio and max_drawdown`);
  }
  const metrics: ArtifactMetrics = { total_return, sharpe_ratio, max_drawdown };
  if (isFiniteNumber(trade_count)) {
    metrics.trade_count = trade_count;
  }
  return metrics;
}

function parseParams(raw: unknown, where: string): Record<string, number> {
  if (!isRecord(raw)) {
    throw new DataError(`${where} must be an object`);
  }
  const params: Record<string, number> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isFiniteNumber(value)) {
      throw new DataError(`${where}.${key} must be a number`);
    }
    params[key] = value;
  }
  if (Object.keys(fromArtifactParams(params)).length === 0) {
    throw new DataError(`${where} has no recognized parameters`);
  }
  return params;
}

function parseResult(raw: unknown, index: number): ArtifactResult {
  const where = `results[${index}]`;
  if (!isRecord(raw)) {
    throw new DataError(`${where} must be an object`);
  }
  const result: ArtifactResult = {
    params: parseParams(raw.params, `${where}.params`),
    IS_metrics: parseMetrics(raw.IS_metrics, `${where}.IS_metrics`),
  };
  if (raw.OOS_metrics !== undefined && raw.OOS_metrics !== null) {
    result.OOS_metrics = parseMetrics(raw.OOS_metrics, `${where}.OOS_metrics`);
  }
  if (isFiniteNumber(raw.robustness_factor)) {
    result.robustness_factor = raw.robustness_factor;
  }
  if (isFiniteNumber(raw.degradation_ratio)) {
    result.degradation_ratio = raw.degradation_ratio;
  }
  return result;
}

function parseMetadata(raw: unknown): ArtifactMetadata {
  if (!isRecord(raw)) {
    throw new DataError('metadata must be an object');
  }
  const mode = requireString(raw, 'validation_mode', 'metadata');
  if (!isValidationMode(mode)) {
    throw new DataError(`metadata.validation_mode must be walk_forward or standard (got ${mode})`);
  }
  const tested = raw.total_combinations_tested;
  return {
    timestamp: requireString(raw, 'timestamp', 'metadata'),
    symbol: requireString(raw, 'symbol', 'metadata'),
    timeframe: requireString(raw, 'timeframe', 'metadata'),
    start_date: requireString(raw, 'start_date', 'metadata'),
    end_date: requireString(raw, 'end_date', 'metadata'),
    split_date: optionalString(raw, 'split_date', 'metadata'),
    validation_mode: mode,
    in_sample_period: requireString(raw, 'in_sample_period', 'metadata'),
    out_of_sample_period: optionalString(raw, 'out_of_sample_period', 'metadata'),
    total_combinations_tested: isFiniteNumber(tested) ? tested : 0,
    strategy: typeof raw.strategy === 'string' ? raw.strategy : 'unknown',
    long_only: optionalBoolean(raw, 'long_only', 'metadata'),
    macd_slow: optionalNumber(raw, 'macd_slow', 'metadata'),
    macd_signal: optionalNumber(raw, 'macd_signal', 'metadata'),
  };
}

/**
 * Validate an already-parsed JSON document. Throws DataError when malformed.
 */
export function parseOptimizationReport(document: unknown): OptimizationReport {
  if (!isRecord(document)) {
    throw new DataError('Optimization report must be a JSON object');
  }
  if (!Array.isArray(document.results)) {
    throw new DataError('Optimization report has no results array');
  }
  return {
    metadata: parseMetadata(document.metadata),
    results: document.results.map(parseResult),
  };
}

export async function readOptimizationReport(path: string): Promise<OptimizationReport> {
  const text = await fs.readFile(path, 'utf8');
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new DataError(`Optimization report ${path} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseOptimizationReport(document);
}

/**
 * Back from artifact form into engine results, for ranking.
 */
export function fromArtifactResult(result: ArtifactResult): OptimizationResult {
  const toMetrics = (metrics: ArtifactMetrics): BacktestMetrics => ({
    totalReturn: metrics.total_return,
    sharpeRatio: metrics.sharpe_ratio,
    maxDrawdown: metrics.max_drawdown,
    equityCurve: [],
    tradeCount: metrics.trade_count ?? 0,
  });

  const converted: OptimizationResult = {
    params: fromArtifactParams(result.params),
    isMetrics: toMetrics(result.IS_metrics),
  };
  if (result.OOS_metrics) {
    converted.oosMetrics = toMetrics(result.OOS_metrics);
  }
  return converted;
}
