/**
 * AdxRegimeFilter - Market regime classification from ADX / DMI
 *
 * TRENDING_UP   : ADX > threshold and +DI > -DI
 * TRENDING_DOWN : ADX > threshold and -DI > +DI
 * RANGING       : everything else, including warm-up bars
 */

import { EntryDirection, MarketRegime, PriceSeries } from '@quantsweep/shared-types';
import { ConfigurationError } from '@quantsweep/shared-utils';
import { DirectionalIndex, assertWindow, directionalMovement } from '../indicators';
import { RegimeFilter, RegimeFilterConfig, RegimePolicy, RegimeSummary } from './types';

export class AdxRegimeFilter implements RegimeFilter {
  readonly name = 'adx_regime';
  readonly adxWindow: number;
  readonly adxThreshold: number;
  readonly policy: RegimePolicy;
  private cache = new WeakMap<PriceSeries, { dmi: DirectionalIndex; regimes: MarketRegime[] }>();

  constructor(config: RegimeFilterConfig) {
    assertWindow(config.adxWindow, 'adxWindow');
    if (!Number.isFinite(config.adxThreshold) || config.adxThreshold < 0 || config.adxThreshold > 100) {
      throw new ConfigurationError(`adxThreshold must be within 0-100 (got ${config.adxThreshold})`);
    }
    this.adxWindow = config.adxWindow;
    this.adxThreshold = config.adxThreshold;
    this.policy = config.policy ?? 'trend_following';
  }

  /**
   * Both smoothing stages must be seeded before ADX is trustworthy.
   */
  get maxLookbackPeriod(): number {
    return 2 * this.adxWindow;
  }

  indicators(series: PriceSeries): DirectionalIndex {
    return this.compute(series).dmi;
  }

  classify(series: PriceSeries): MarketRegime[] {
    return [...this.compute(series).regimes];
  }

  evaluate(series: PriceSeries, direction: EntryDirection): boolean[] {
    const { regimes } = this.compute(series);
    const favourable: MarketRegime = direction === 'BUY' ? 'TRENDING_UP' : 'TRENDING_DOWN';
    const opposed: MarketRegime = direction === 'BUY' ? 'TRENDING_DOWN' : 'TRENDING_UP';

    if (this.policy === 'mean_reversion') {
      return regimes.map((regime) => regime !== opposed);
    }
    return regimes.map((regime) => regime === favourable);
  }

  /**
   * Regime distribution and ADX statistics over the warmed-up bars.
   */
  summarize(series: PriceSeries): RegimeSummary {
    const { dmi, regimes } = this.compute(series);
    const counts: Record<MarketRegime, number> = { TRENDING_UP: 0, TRENDING_DOWN: 0, RANGING: 0 };
    let adxSum = 0;
    let adxMax = 0;
    let plusDominant = 0;
    let minusDominant = 0;
    let classified = 0;

    for (let i = this.maxLookbackPeriod; i < series.length; i++) {
      classified++;
      counts[regimes[i]]++;
      const adx = dmi.adx[i];
      adxSum += adx;
      adxMax = Math.max(adxMax, adx);
      if (dmi.plusDi[i] > dmi.minusDi[i]) plusDominant++;
      if (dmi.minusDi[i] > dmi.plusDi[i]) minusDominant++;
    }

    return {
      barsClassified: classified,
      counts,
      adxMean: classified > 0 ? adxSum / classified : 0,
      adxMax,
      plusDiDominantBars: plusDominant,
      minusDiDominantBars: minusDominant,
    };
  }

  private compute(series: PriceSeries): { dmi: DirectionalIndex; regimes: MarketRegime[] } {
    const cached = this.cache.get(series);
    if (cached) {
      return cached;
    }

    const dmi = directionalMovement(series, this.adxWindow);
    const regimes = dmi.adx.map((adx, i): MarketRegime => {
      // NaN comparisons are false, so warm-up bars fall through to RANGING
      if (adx > this.adxThreshold && dmi.plusDi[i] > dmi.minusDi[i]) return 'TRENDING_UP';
      if (adx > this.adxThreshold && dmi.minusDi[i] > dmi.plusDi[i]) return 'TRENDING_DOWN';
      return 'RANGING';
    });

    const entry = { dmi, regimes };
    this.cache.set(series, entry);
    return entry;
  }
}
