import { ConfigurationError } from '@quantsweep/shared-utils';

const MINUTES_PER_UNIT: Record<string, number> = {
  m: 1,
  h: 60,
  d: 60 * 24,
  w: 60 * 24 * 7,
};

const MINUTES_PER_YEAR = 365 * 24 * 60;

/**
 * Parse an exchange-style timeframe ("15m", "1h", "4h", "1d", "1w") into minutes.
 */
export function timeframeToMinutes(timeframe: string): number {
  const match = /^(\d+)([mhdw])$/.exec(timeframe.trim());
  if (!match) {
    throw new ConfigurationError(`Unrecognized timeframe "${timeframe}" (expected e.g. 15m, 1h, 4h, 1d, 1w)`);
  }
  const amount = parseInt(match[1], 10);
  if (amount <= 0) {
    throw new ConfigurationError(`Timeframe "${timeframe}" must have a positive length`);
  }
  return amount * MINUTES_PER_UNIT[match[2]];
}

export function timeframeToMilliseconds(timeframe: string): number {
  return timeframeToMinutes(timeframe) * 60_000;
}

/**
 * Bars per calendar year (crypto markets trade 24/7): 1h -> 8760, 4h -> 2190, 1d -> 365.
 */
export function periodsPerYear(timeframe: string): number {
  return MINUTES_PER_YEAR / timeframeToMinutes(timeframe);
}
