/**
 * ParameterSpace - dimension detection, range validation and cartesian product
 *
 * Supported shapes are prefixes of one chain:
 *   base (fast/slow or bbWindow/bbStdDev) -> atr -> adx -> macdFast -> maxHoldHours
 * giving 2, 4, 6, 7 or 8 active dimensions.
 */

import { StrategyKind } from '@quantsweep/shared-types';
import { ConfigurationError } from '@quantsweep/shared-utils';
import { EngineSettings } from '../config';
import { StrategyConfig, StrategySpec } from '../strategies/types';
import {
  DimensionLayout,
  DimensionName,
  ParameterConfiguration,
  ParameterRanges,
  StrategyFamily,
} from './OptimizationTypes';

interface DimensionGroup {
  label: string;
  dimensions: readonly DimensionName[];
}

const BASE_GROUPS: Record<StrategyFamily, DimensionGroup> = {
  moving_average: { label: 'fast/slow', dimensions: ['fastWindow', 'slowWindow'] },
  bollinger: { label: 'bb_window/bb_std_dev', dimensions: ['bbWindow', 'bbStdDev'] },
};

const EXTENSION_CHAIN: readonly DimensionGroup[] = [
  { label: 'atr_window/atr_multiplier', dimensions: ['atrWindow', 'atrMultiplier'] },
  { label: 'adx_window/adx_threshold', dimensions: ['adxWindow', 'adxThreshold'] },
  { label: 'macd_fast', dimensions: ['macdFast'] },
  { label: 'max_hold_hours', dimensions: ['maxHoldHours'] },
];

const INTEGER_DIMENSIONS: ReadonlySet<DimensionName> = new Set<DimensionName>([
  'fastWindow',
  'slowWindow',
  'bbWindow',
  'atrWindow',
  'adxWindow',
  'macdFast',
]);

/**
 * Keys used in result artifacts and reusable strategy configs.
 */
export const ARTIFACT_PARAM_KEYS: Record<DimensionName, string> = {
  fastWindow: 'fast_window',
  slowWindow: 'slow_window',
  bbWindow: 'bb_window',
  bbStdDev: 'bb_std_dev',
  atrWindow: 'atr_window',
  atrMultiplier: 'atr_multiplier',
  adxWindow: 'adx_window',
  adxThreshold: 'adx_threshold',
  macdFast: 'macd_fast',
  maxHoldHours: 'max_hold_hours',
};

export const DIMENSION_NAMES = Object.keys(ARTIFACT_PARAM_KEYS).filter(isDimensionName);

export function isDimensionName(value: string): value is DimensionName {
  return Object.prototype.hasOwnProperty.call(ARTIFACT_PARAM_KEYS, value);
}

export function dimensionFromArtifactKey(key: string): DimensionName | undefined {
  return DIMENSION_NAMES.find((name) => ARTIFACT_PARAM_KEYS[name] === key);
}

/**
 * Parse "5,10,20" into [5, 10, 20].
 */
export function parseRange(raw: string, label: string): number[] {
  const parts = raw.split(',').map((part) => part.trim()).filter((part) => part.length > 0);
  if (parts.length === 0) {
    throw new ConfigurationError(`Range for ${label} is empty`);
  }
  return parts.map((part) => {
    const value = Number(part);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`Range for ${label} contains a non-numeric value "${part}"`);
    }
    return value;
  });
}

function isSupplied(ranges: ParameterRanges, name: DimensionName): boolean {
  return ranges[name] !== undefined;
}

function groupState(ranges: ParameterRanges, group: DimensionGroup): 'absent' | 'complete' {
  const supplied = group.dimensions.filter((name) => isSupplied(ranges, name));
  if (supplied.length === 0) {
    return 'absent';
  }
  if (supplied.length < group.dimensions.length) {
    throw new ConfigurationError(
      `Dimension pair ${group.label} supplied partially (only ${supplied.map((n) => ARTIFACT_PARAM_KEYS[n]).join(', ')})`
    );
  }
  return 'complete';
}

function validateValues(name: DimensionName, values: readonly number[]): void {
  const key = ARTIFACT_PARAM_KEYS[name];
  if (values.length === 0) {
    throw new ConfigurationError(`Range for ${key} is empty`);
  }
  for (const value of values) {
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`Range for ${key} contains a non-finite value`);
    }
    if (INTEGER_DIMENSIONS.has(name) && (!Number.isInteger(value) || value < 1)) {
      throw new ConfigurationError(`${key} values must be positive integers (got ${value})`);
    }
    if (name === 'adxThreshold' && (value < 0 || value > 100)) {
      throw new ConfigurationError(`adx_threshold values must be within 0-100 (got ${value})`);
    }
    if (!INTEGER_DIMENSIONS.has(name) && name !== 'adxThreshold' && !(value > 0)) {
      throw new ConfigurationError(`${key} values must be positive (got ${value})`);
    }
  }
}

/**
 * Work out which dimensions are active. Throws ConfigurationError on partial
 * pairs, both or neither base pair, gaps in the chain, or bad values.
 */
export function detectDimensions(ranges: ParameterRanges): DimensionLayout {
  const hasMovingAverage = groupState(ranges, BASE_GROUPS.moving_average) === 'complete';
  const hasBollinger = groupState(ranges, BASE_GROUPS.bollinger) === 'complete';

  if (hasMovingAverage && hasBollinger) {
    throw new ConfigurationError('Supply either fast/slow or bb_window/bb_std_dev ranges, not both');
  }
  if (!hasMovingAverage && !hasBollinger) {
    throw new ConfigurationError('A base dimension pair is required: fast/slow or bb_window/bb_std_dev');
  }

  const family: StrategyFamily = hasMovingAverage ? 'moving_average' : 'bollinger';
  const dimensions: DimensionName[] = [...BASE_GROUPS[family].dimensions];
  let missing: DimensionGroup | undefined;

  for (const group of EXTENSION_CHAIN) {
    const state = groupState(ranges, group);
    if (state === 'absent') {
      missing = missing ?? group;
      continue;
    }
    if (missing) {
      throw new ConfigurationError(
        `Unsupported dimension set: ${group.label} requires ${missing.label} to be supplied as well`
      );
    }
    dimensions.push(...group.dimensions);
  }

  for (const name of dimensions) {
    validateValues(name, ranges[name] ?? []);
  }

  return { family, dimensions };
}

export function countCombinations(ranges: ParameterRanges, layout: DimensionLayout): number {
  return layout.dimensions.reduce((count, name) => count * (ranges[name]?.length ?? 0), 1);
}

/**
 * Cartesian product, first dimension outermost.
 */
export function generateCombinations(ranges: ParameterRanges, layout: DimensionLayout): ParameterConfiguration[] {
  const combinations: ParameterConfiguration[] = [];

  const expand = (index: number, current: Partial<Record<DimensionName, number>>): void => {
    if (index === layout.dimensions.length) {
      combinations.push(Object.freeze({ ...current }));
      return;
    }
    const name = layout.dimensions[index];
    for (const value of ranges[name] ?? []) {
      current[name] = value;
      expand(index + 1, current);
    }
  };

  expand(0, {});
  return combinations;
}

/**
 * fast < slow applies to moving-average shapes only; macdFast must stay below the fixed slow MACD period.
 */
export function isValidCombination(
  params: ParameterConfiguration,
  layout: DimensionLayout,
  settings: Pick<EngineSettings, 'macdSlow'>
): boolean {
  if (layout.family === 'moving_average') {
    const { fastWindow, slowWindow } = params;
    if (fastWindow === undefined || slowWindow === undefined || fastWindow >= slowWindow) {
      return false;
    }
  }
  if (params.macdFast !== undefined && params.macdFast >= settings.macdSlow) {
    return false;
  }
  return true;
}

/**
 * Map a parameter point to the strategy it parameterizes.
 * fast/slow alone -> sma_cross; fast/slow + ATR -> volatility_adjusted;
 * bb_window/bb_std_dev -> bollinger_band (ATR stops when present).
 */
export function strategyConfigFromParameters(
  params: ParameterConfiguration,
  settings: Pick<EngineSettings, 'macdSlow' | 'macdSignal' | 'volatilityLookback' | 'longOnly'>
): StrategyConfig {
  const { fastWindow, slowWindow, bbWindow, bbStdDev, atrWindow, atrMultiplier } = params;
  let strategy: StrategySpec;

  if (bbWindow !== undefined && bbStdDev !== undefined) {
    strategy = { kind: 'bollinger_band', bbWindow, bbStdDev, atrWindow, atrMultiplier };
  } else if (fastWindow !== undefined && slowWindow !== undefined) {
    strategy =
      atrWindow !== undefined && atrMultiplier !== undefined
        ? {
            kind: 'volatility_adjusted',
            fastWindow,
            slowWindow,
            atrWindow,
            atrMultiplier,
            volatilityLookback: settings.volatilityLookback,
          }
        : { kind: 'sma_cross', fastWindow, slowWindow };
  } else {
    throw new ConfigurationError(`Parameter set has no base dimensions: ${JSON.stringify(params)}`);
  }

  const config: StrategyConfig = { strategy, longOnly: settings.longOnly };
  if (params.adxWindow !== undefined && params.adxThreshold !== undefined) {
    config.regimeFilter = { adxWindow: params.adxWindow, adxThreshold: params.adxThreshold };
  }
  if (params.macdFast !== undefined) {
    config.momentumFilter = {
      macdFast: params.macdFast,
      macdSlow: settings.macdSlow,
      macdSignal: settings.macdSignal,
    };
  }
  if (params.maxHoldHours !== undefined) {
    config.maxHoldHours = params.maxHoldHours;
  }
  return config;
}

export function toArtifactParams(params: ParameterConfiguration): Record<string, number> {
  const out: Record<string, number> = {};
  for (const name of DIMENSION_NAMES) {
    const value = params[name];
    if (value !== undefined) {
      out[ARTIFACT_PARAM_KEYS[name]] = value;
    }
  }
  return out;
}

export function fromArtifactParams(raw: Record<string, number>): ParameterConfiguration {
  const params: Partial<Record<DimensionName, number>> = {};
  for (const [key, value] of Object.entries(raw)) {
    const name = dimensionFromArtifactKey(key);
    if (name) {
      params[name] = value;
    }
  }
  return params;
}

export function describeParams(params: ParameterConfiguration): string {
  return Object.entries(toArtifactParams(params))
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
}

export function strategyKindForParameters(params: ParameterConfiguration): StrategyKind {
  if (params.bbWindow !== undefined) {
    return 'bollinger_band';
  }
  return params.atrWindow !== undefined ? 'volatility_adjusted' : 'sma_cross';
}
