/**
 * Optimization Types
 *
 * Search-space, result and artifact shapes for the walk-forward optimizer.
 */

import { ValidationMode } from '@quantsweep/shared-types';
import { BacktestMetrics } from '../backtesting/types';

/**
 * Tunable dimensions. fast/slow and bbWindow/bbStdDev are mutually exclusive bases.
 */
export type DimensionName =
  | 'fastWindow'
  | 'slowWindow'
  | 'bbWindow'
  | 'bbStdDev'
  | 'atrWindow'
  | 'atrMultiplier'
  | 'adxWindow'
  | 'adxThreshold'
  | 'macdFast'
  | 'maxHoldHours';

/**
 * One point of the search space: 2-8 named values.
 */
export type ParameterConfiguration = Readonly<Partial<Record<DimensionName, number>>>;

/**
 * Candidate values per active dimension, e.g. { fastWindow: [5, 10], slowWindow: [20, 40] }
 */
export type ParameterRanges = Partial<Record<DimensionName, readonly number[]>>;

export type StrategyFamily = 'moving_average' | 'bollinger';

export interface DimensionLayout {
  family: StrategyFamily;
  dimensions: DimensionName[]; // canonical order, first is outermost in the product
}

export interface OptimizationResult {
  params: ParameterConfiguration;
  isMetrics: BacktestMetrics;
  oosMetrics?: BacktestMetrics;
  robustnessFactor?: number;
  degradationRatio?: number;
}

export interface SearchSummary {
  validationMode: ValidationMode;
  totalCombinations: number; // raw cartesian product size
  validCombinations: number; // after validity constraints
  combinationsTested: number; // in-sample evaluations that completed
  failedCombinations: number; // skipped after a per-combination error
  outOfSampleTested: number;
  splitDate?: number;
}

// Output artifact (JSON document)

export interface ArtifactMetrics {
  total_return: number;
  sharpe_ratio: number;
  max_drawdown: number;
  trade_count?: number;
}

export interface ArtifactResult {
  params: Record<string, number>;
  IS_metrics: ArtifactMetrics;
  OOS_metrics?: ArtifactMetrics;
  robustness_factor?: number;
  degradation_ratio?: number;
}

export interface ArtifactMetadata {
  timestamp: string; // ISO 8601
  symbol: string;
  timeframe: string;
  start_date: string; // YYYY-MM-DD, or a full UTC timestamp for an intraday boundary
  end_date: string;
  split_date: string | null;
  validation_mode: ValidationMode;
  in_sample_period: string;
  out_of_sample_period: string | null;
  total_combinations_tested: number;
  strategy: string;
  long_only: boolean;
  // fixed MACD slow/signal periods behind macd_fast; null when macd_fast was not searched
  macd_slow: number | null;
  macd_signal: number | null;
}

export interface OptimizationReport {
  metadata: ArtifactMetadata;
  results: ArtifactResult[];
}
