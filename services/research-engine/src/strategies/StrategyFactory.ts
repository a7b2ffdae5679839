/**
 * Strategy Factory
 *
 * Resolves a StrategySpec (closed union of strategy kinds) to a concrete
 * pipeline, and wires the optional regime / momentum gates from a
 * StrategyConfig.
 */

import { StrategyKind } from '@quantsweep/shared-types';
import { ConfigurationError } from '@quantsweep/shared-utils';
import { AdxRegimeFilter, MacdMomentumFilter, RegimePolicy } from '../filters';
import { BaseStrategy } from './BaseStrategy';
import { BollingerBandStrategy } from './BollingerBandStrategy';
import { SmaCrossStrategy } from './SmaCrossStrategy';
import { StrategyConfig, StrategyOptions, StrategySpec } from './types';
import { VolatilityAdjustedStrategy } from './VolatilityAdjustedStrategy';

export const STRATEGY_KINDS: readonly StrategyKind[] = ['sma_cross', 'volatility_adjusted', 'bollinger_band'];

export function isStrategyKind(value: string): value is StrategyKind {
  return STRATEGY_KINDS.some((kind) => kind === value);
}

/**
 * Regime reading per strategy family: crossovers follow the trend,
 * band reversions only avoid trading against it.
 */
export function regimePolicyFor(kind: StrategyKind): RegimePolicy {
  return kind === 'bollinger_band' ? 'mean_reversion' : 'trend_following';
}

export function createStrategy(spec: StrategySpec, options: StrategyOptions = {}): BaseStrategy {
  switch (spec.kind) {
    case 'sma_cross':
      return new SmaCrossStrategy(spec, options);
    case 'volatility_adjusted':
      return new VolatilityAdjustedStrategy(spec, options);
    case 'bollinger_band':
      return new BollingerBandStrategy(spec, options);
    default: {
      const unknownSpec: never = spec;
      throw new ConfigurationError(`Unknown strategy kind: ${JSON.stringify(unknownSpec)}`);
    }
  }
}

/**
 * Build a fully wired pipeline from a StrategyConfig.
 */
export function buildPipeline(config: StrategyConfig): BaseStrategy {
  const regimeFilter = config.regimeFilter
    ? new AdxRegimeFilter({
        ...config.regimeFilter,
        policy: config.regimeFilter.policy ?? regimePolicyFor(config.strategy.kind),
      })
    : undefined;
  const momentumFilter = config.momentumFilter ? new MacdMomentumFilter(config.momentumFilter) : undefined;

  return createStrategy(config.strategy, {
    regimeFilter,
    momentumFilter,
    longOnly: config.longOnly,
  });
}
