import { EntryDirection, PriceSeries } from '@quantsweep/shared-types';
import { EntryFilter } from './types';

/**
 * Null-object filter: needs no warm-up and lets every entry through.
 */
export class PassThroughFilter implements EntryFilter {
  readonly name = 'pass_through';
  readonly maxLookbackPeriod = 0;

  evaluate(series: PriceSeries, _direction: EntryDirection): boolean[] {
    return new Array<boolean>(series.length).fill(true);
  }
}

export const PASS_THROUGH_FILTER: EntryFilter = new PassThroughFilter();
