import { describe, it, expect } from '@jest/globals';
import { ConfigurationError } from '@quantsweep/shared-utils';
import { DEFAULT_ENGINE_SETTINGS } from '../../src/config';
import {
  countCombinations,
  describeParams,
  detectDimensions,
  fromArtifactParams,
  generateCombinations,
  isValidCombination,
  parseRange,
  strategyConfigFromParameters,
  strategyKindForParameters,
  toArtifactParams,
} from '../../src/optimization/ParameterSpace';

const maRanges = { fastWindow: [5, 10], slowWindow: [20, 40] };

describe('ParameterSpace', () => {
  describe('parseRange', () => {
    it('should split and trim comma-separated values', () => {
      expect(parseRange('5, 10,20', 'fast')).toEqual([5, 10, 20]);
      expect(parseRange('1.5,2', 'atr-multiplier')).toEqual([1.5, 2]);
    });

    it('should reject non-numeric and empty ranges', () => {
      expect(() => parseRange('5,x', 'fast')).toThrow(ConfigurationError);
      expect(() => parseRange(' , ', 'fast')).toThrow(ConfigurationError);
    });
  });

  describe('detectDimensions', () => {
    it('should detect every supported prefix of the chain', () => {
      const atr = { ...maRanges, atrWindow: [14], atrMultiplier: [2] };
      const adx = { ...atr, adxWindow: [14], adxThreshold: [25] };
      const macd = { ...adx, macdFast: [12] };
      const hold = { ...macd, maxHoldHours: [24] };

      expect(detectDimensions(maRanges).dimensions).toHaveLength(2);
      expect(detectDimensions(atr).dimensions).toHaveLength(4);
      expect(detectDimensions(adx).dimensions).toHaveLength(6);
      expect(detectDimensions(macd).dimensions).toHaveLength(7);
      expect(detectDimensions(hold).dimensions).toEqual([
        'fastWindow',
        'slowWindow',
        'atrWindow',
        'atrMultiplier',
        'adxWindow',
        'adxThreshold',
        'macdFast',
        'maxHoldHours',
      ]);
    });

    it('should detect the Bollinger family', () => {
      expect(detectDimensions({ bbWindow: [20], bbStdDev: [2, 2.5] })).toEqual({
        family: 'bollinger',
        dimensions: ['bbWindow', 'bbStdDev'],
      });
    });

    it('should reject a partially supplied pair', () => {
      expect(() => detectDimensions({ ...maRanges, atrWindow: [14] })).toThrow(/supplied partially/);
      expect(() => detectDimensions({ fastWindow: [5] })).toThrow(ConfigurationError);
    });

    it('should reject a gap in the chain', () => {
      expect(() => detectDimensions({ ...maRanges, adxWindow: [14], adxThreshold: [25] })).toThrow(
        /requires atr_window\/atr_multiplier/
      );
    });

    it('should reject both or neither base pair', () => {
      expect(() => detectDimensions({ ...maRanges, bbWindow: [20], bbStdDev: [2] })).toThrow(ConfigurationError);
      expect(() => detectDimensions({ atrWindow: [14], atrMultiplier: [2] })).toThrow(ConfigurationError);
    });

    it('should reject empty ranges and invalid values', () => {
      expect(() => detectDimensions({ fastWindow: [], slowWindow: [20] })).toThrow(ConfigurationError);
      expect(() => detectDimensions({ fastWindow: [0], slowWindow: [20] })).toThrow(ConfigurationError);
      expect(() =>
        detectDimensions({ ...maRanges, atrWindow: [14], atrMultiplier: [2], adxWindow: [14], adxThreshold: [150] })
      ).toThrow(ConfigurationError);
    });
  });

  describe('generateCombinations', () => {
    it('should keep the first dimension outermost', () => {
      const layout = detectDimensions(maRanges);
      expect(generateCombinations(maRanges, layout)).toEqual([
        { fastWindow: 5, slowWindow: 20 },
        { fastWindow: 5, slowWindow: 40 },
        { fastWindow: 10, slowWindow: 20 },
        { fastWindow: 10, slowWindow: 40 },
      ]);
      expect(countCombinations(maRanges, layout)).toBe(4);
    });

    it('should multiply out every active dimension', () => {
      const ranges = { ...maRanges, atrWindow: [7, 14, 21], atrMultiplier: [1, 2] };
      expect(generateCombinations(ranges, detectDimensions(ranges))).toHaveLength(24);
    });
  });

  describe('isValidCombination', () => {
    const settings = { macdSlow: 26 };

    it('should require fast < slow for moving-average shapes', () => {
      const layout = detectDimensions(maRanges);
      expect(isValidCombination({ fastWindow: 10, slowWindow: 20 }, layout, settings)).toBe(true);
      expect(isValidCombination({ fastWindow: 20, slowWindow: 20 }, layout, settings)).toBe(false);
    });

    it('should not apply the window order to Bollinger shapes', () => {
      const layout = detectDimensions({ bbWindow: [20], bbStdDev: [2] });
      expect(isValidCombination({ bbWindow: 20, bbStdDev: 2 }, layout, settings)).toBe(true);
    });

    it('should require macdFast below the configured slow period', () => {
      const ranges = { ...maRanges, atrWindow: [14], atrMultiplier: [2], adxWindow: [14], adxThreshold: [25], macdFast: [26] };
      const layout = detectDimensions(ranges);
      const params = { fastWindow: 5, slowWindow: 20, atrWindow: 14, atrMultiplier: 2, adxWindow: 14, adxThreshold: 25, macdFast: 26 };
      expect(isValidCombination(params, layout, settings)).toBe(false);
    });
  });

  describe('strategyConfigFromParameters', () => {
    it('should map fast/slow alone to an SMA crossover', () => {
      const config = strategyConfigFromParameters({ fastWindow: 5, slowWindow: 20 }, DEFAULT_ENGINE_SETTINGS);
      expect(config).toEqual({ strategy: { kind: 'sma_cross', fastWindow: 5, slowWindow: 20 }, longOnly: false });
    });

    it('should wire ATR, regime, momentum and max hold from a full point', () => {
      const config = strategyConfigFromParameters(
        { fastWindow: 5, slowWindow: 20, atrWindow: 14, atrMultiplier: 2, adxWindow: 14, adxThreshold: 25, macdFast: 12, maxHoldHours: 48 },
        DEFAULT_ENGINE_SETTINGS
      );
      expect(config).toEqual({
        strategy: {
          kind: 'volatility_adjusted',
          fastWindow: 5,
          slowWindow: 20,
          atrWindow: 14,
          atrMultiplier: 2,
          volatilityLookback: 5,
        },
        longOnly: false,
        regimeFilter: { adxWindow: 14, adxThreshold: 25 },
        momentumFilter: { macdFast: 12, macdSlow: 26, macdSignal: 9 },
        maxHoldHours: 48,
      });
    });

    it('should map Bollinger parameters to the band strategy', () => {
      const config = strategyConfigFromParameters({ bbWindow: 20, bbStdDev: 2 }, DEFAULT_ENGINE_SETTINGS);
      expect(config.strategy.kind).toBe('bollinger_band');
    });

    it('should reject a point without base dimensions', () => {
      expect(() => strategyConfigFromParameters({ atrWindow: 14 }, DEFAULT_ENGINE_SETTINGS)).toThrow(ConfigurationError);
    });
  });

  describe('artifact keys', () => {
    it('should convert to snake_case and back', () => {
      const params = { fastWindow: 5, slowWindow: 20, atrMultiplier: 1.5, atrWindow: 14 };
      expect(toArtifactParams(params)).toEqual({ fast_window: 5, slow_window: 20, atr_window: 14, atr_multiplier: 1.5 });
      expect(fromArtifactParams({ fast_window: 5, slow_window: 20, unknown_key: 3 })).toEqual({ fastWindow: 5, slowWindow: 20 });
    });

    it('should describe parameters in canonical order', () => {
      expect(describeParams({ slowWindow: 20, fastWindow: 5 })).toBe('fast_window=5, slow_window=20');
    });

    it('should name the strategy a point parameterizes', () => {
      expect(strategyKindForParameters({ fastWindow: 5, slowWindow: 20 })).toBe('sma_cross');
      expect(strategyKindForParameters({ fastWindow: 5, slowWindow: 20, atrWindow: 14, atrMultiplier: 2 })).toBe('volatility_adjusted');
      expect(strategyKindForParameters({ bbWindow: 20, bbStdDev: 2 })).toBe('bollinger_band');
    });
  });
});
