/**
 * RobustnessAnalyzer - ranks validated configurations by out-of-sample stability
 *
 * Robustness factor FR = Sharpe_OOS * (Sharpe_OOS / Sharpe_IS), zero unless the
 * out-of-sample Sharpe is positive and the in-sample Sharpe exceeds epsilon.
 * A configuration that holds up out of sample outranks one that only shone in-sample.
 */

import { DataError } from '@quantsweep/shared-utils';
import { BacktestMetrics } from '../backtesting/types';
import { OptimizationResult } from '../optimization/OptimizationTypes';
import { describeParams, strategyKindForParameters, toArtifactParams } from '../optimization/ParameterSpace';

export interface RobustnessAnalyzerOptions {
  epsilon: number;
}

export interface RankedResult extends OptimizationResult {
  oosMetrics: BacktestMetrics;
  robustnessFactor: number;
  degradationRatio: number;
}

export interface RecommendationContext {
  symbol: string;
  timeframe: string;
  longOnly?: boolean;
  macdSlow?: number; // fixed periods behind a searched macd_fast
  macdSignal?: number;
}

export interface Recommendation {
  strategy: {
    name: string;
    symbol: string;
    timeframe: string;
    params: Record<string, number>;
    longOnly: boolean;
    macdSlow?: number;
    macdSignal?: number;
  };
  metrics: {
    inSample: BacktestMetrics;
    outOfSample: BacktestMetrics;
  };
  robustnessFactor: number;
  degradationRatio: number;
}

const RULE = '='.repeat(100);
const PARAMS_WIDTH = 40;

function pct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

export class RobustnessAnalyzer {
  private readonly epsilon: number;

  constructor(options: RobustnessAnalyzerOptions) {
    this.epsilon = options.epsilon;
  }

  robustnessFactor(sharpeIs: number, sharpeOos: number): number {
    if (sharpeOos <= 0 || sharpeIs <= this.epsilon) {
      return 0;
    }
    return sharpeOos * (sharpeOos / sharpeIs);
  }

  degradationRatio(sharpeIs: number, sharpeOos: number): number {
    return sharpeIs > 0 ? sharpeOos / sharpeIs : 0;
  }

  /**
   * New objects sorted by robustness factor, highest first. Ties keep input order.
   */
  rank(results: readonly OptimizationResult[]): RankedResult[] {
    const scored = results.map((result, index): RankedResult => {
      const { oosMetrics } = result;
      if (!oosMetrics) {
        throw new DataError(`Result ${index} (${describeParams(result.params)}) has no out-of-sample metrics`);
      }
      const sharpeIs = result.isMetrics.sharpeRatio;
      const sharpeOos = oosMetrics.sharpeRatio;
      return {
        params: result.params,
        isMetrics: result.isMetrics,
        oosMetrics,
        robustnessFactor: this.robustnessFactor(sharpeIs, sharpeOos),
        degradationRatio: this.degradationRatio(sharpeIs, sharpeOos),
      };
    });

    return scored.sort((a, b) => b.robustnessFactor - a.robustnessFactor);
  }

  recommend(ranked: readonly RankedResult[], context: RecommendationContext): Recommendation | null {
    const best = ranked[0];
    if (!best) {
      return null;
    }
    const strategy: Recommendation['strategy'] = {
      name: strategyKindForParameters(best.params),
      symbol: context.symbol,
      timeframe: context.timeframe,
      params: toArtifactParams(best.params),
      longOnly: context.longOnly ?? false,
    };
    if (best.params.macdFast !== undefined && context.macdSlow !== undefined && context.macdSignal !== undefined) {
      strategy.macdSlow = context.macdSlow;
      strategy.macdSignal = context.macdSignal;
    }
    return {
      strategy,
      metrics: { inSample: best.isMetrics, outOfSample: best.oosMetrics },
      robustnessFactor: best.robustnessFactor,
      degradationRatio: best.degradationRatio,
    };
  }

  formatReport(ranked: readonly RankedResult[], top: number = ranked.length): string[] {
    const lines = [RULE, 'TOP ROBUST PARAMETER CONFIGURATIONS', RULE, ''];
    lines.push(
      [
        'Rank'.padEnd(6),
        'Parameters'.padEnd(PARAMS_WIDTH),
        'Sharpe_IS'.padStart(10),
        'Sharpe_OOS'.padStart(12),
        'Degradation'.padStart(12),
        'Robustness (FR)'.padStart(16),
      ].join(' ')
    );
    lines.push('-'.repeat(100));

    ranked.slice(0, top).forEach((result, index) => {
      let params = describeParams(result.params);
      if (params.length > PARAMS_WIDTH - 2) {
        params = `${params.slice(0, PARAMS_WIDTH - 5)}...`;
      }
      lines.push(
        [
          String(index + 1).padEnd(6),
          params.padEnd(PARAMS_WIDTH),
          result.isMetrics.sharpeRatio.toFixed(3).padStart(10),
          result.oosMetrics.sharpeRatio.toFixed(3).padStart(12),
          result.degradationRatio.toFixed(3).padStart(12),
          result.robustnessFactor.toFixed(3).padStart(16),
        ].join(' ')
      );
    });
    lines.push(RULE);

    const best = ranked[0];
    if (best) {
      lines.push(
        '',
        `Best: ${describeParams(best.params)}`,
        `  Return IS/OOS:       ${pct(best.isMetrics.totalReturn)} / ${pct(best.oosMetrics.totalReturn)}`,
        `  Max drawdown IS/OOS: ${pct(best.isMetrics.maxDrawdown)} / ${pct(best.oosMetrics.maxDrawdown)}`
      );
    }
    return lines;
  }
}
