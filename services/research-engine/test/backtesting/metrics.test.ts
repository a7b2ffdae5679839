import { describe, it, expect } from '@jest/globals';
import { computeMetrics, maxDrawdown, periodReturns, sharpeRatio } from '../../src/backtesting/metrics';

describe('metrics', () => {
  describe('periodReturns', () => {
    it('should measure the first return from a 1.0 baseline', () => {
      const returns = periodReturns([1.1, 1.1, 0.99]);
      expect(returns[0]).toBeCloseTo(0.1, 12);
      expect(returns[1]).toBe(0);
      expect(returns[2]).toBeCloseTo(-0.1, 12);
    });
  });

  describe('sharpeRatio', () => {
    it('should annualize mean over population std by sqrt(periodsPerYear)', () => {
      // mean 0.01, population std 0.01
      expect(sharpeRatio([0.02, 0], 24)).toBeCloseTo(Math.sqrt(24), 9);
    });

    it('should be 0 when returns have no dispersion', () => {
      expect(sharpeRatio([0.01, 0.01, 0.01], 8760)).toBe(0);
      expect(sharpeRatio([], 8760)).toBe(0);
    });
  });

  describe('maxDrawdown', () => {
    it('should measure against a running peak starting at 1.0', () => {
      expect(maxDrawdown([0.9, 0.95])).toBeCloseTo(-0.1, 12);
      expect(maxDrawdown([1.2, 0.9, 1.3])).toBeCloseTo(-0.25, 12);
    });

    it('should be 0 for a curve that never falls', () => {
      expect(maxDrawdown([1, 1.1, 1.2])).toBe(0);
    });
  });

  describe('computeMetrics', () => {
    it('should report zeros when there were no trades', () => {
      const metrics = computeMetrics([1, 1, 1], 0, '1h');
      expect(metrics).toEqual({ totalReturn: 0, sharpeRatio: 0, maxDrawdown: 0, equityCurve: [1, 1, 1], tradeCount: 0 });
    });

    it('should annualize hourly bars with 8760 periods', () => {
      const metrics = computeMetrics([1.02, 1.02], 1, '1h');
      expect(metrics.totalReturn).toBeCloseTo(0.02, 12);
      expect(metrics.sharpeRatio).toBeCloseTo(Math.sqrt(8760), 6);
      expect(metrics.maxDrawdown).toBe(0);
    });
  });
});
