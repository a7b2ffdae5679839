import { getResearchEngineConfig as getBaseConfig, PriceDataSourceKind } from '@quantsweep/shared-config';

/**
 * Immutable settings shared by the optimizer, engine and analyzer.
 * Built once per run and passed explicitly; no component mutates it.
 */
export interface EngineSettings {
  initialCapital: number;
  robustnessEpsilon: number; // in-sample Sharpe at or below this disqualifies a result
  defaultTopN: number;
  warmupBufferBars: number; // history requested before the window start
  macdSlow: number;
  macdSignal: number;
  volatilityLookback: number;
  stopLossPct?: number; // fallback stop when a strategy supplies none
  takeProfitPct?: number; // fallback target when a strategy supplies none
  longOnly: boolean;
}

export interface ResearchEngineConfig {
  databaseUrl?: string;
  timezone: string;
  dataSource: PriceDataSourceKind;
  csvPath?: string;
  exchangeBaseUrl: string;
  exchangePageLimit: number;
  resultsDir: string;
  engine: Readonly<EngineSettings>;
}

export const DEFAULT_ENGINE_SETTINGS: Readonly<EngineSettings> = Object.freeze({
  initialCapital: 10000,
  robustnessEpsilon: 0.01,
  defaultTopN: 5,
  warmupBufferBars: 1000,
  macdSlow: 26,
  macdSignal: 9,
  volatilityLookback: 5,
  longOnly: false,
});

function optionalFloat(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = parseFloat(raw);
  return Number.isFinite(value) ? value : undefined;
}

export function createEngineSettings(overrides: Partial<EngineSettings> = {}): Readonly<EngineSettings> {
  return Object.freeze({ ...DEFAULT_ENGINE_SETTINGS, ...overrides });
}

export function getConfig(): ResearchEngineConfig {
  const baseConfig = getBaseConfig();

  const engine = createEngineSettings({
    initialCapital: parseFloat(process.env.INITIAL_CAPITAL || '10000'),
    robustnessEpsilon: parseFloat(process.env.ROBUSTNESS_EPSILON || '0.01'),
    defaultTopN: parseInt(process.env.OPTIMIZER_DEFAULT_TOP_N || '5', 10),
    warmupBufferBars: parseInt(process.env.WARMUP_BUFFER_BARS || '1000', 10),
    macdSlow: parseInt(process.env.MACD_SLOW || '26', 10),
    macdSignal: parseInt(process.env.MACD_SIGNAL || '9', 10),
    volatilityLookback: parseInt(process.env.VOLATILITY_LOOKBACK || '5', 10),
    stopLossPct: optionalFloat(process.env.STOP_LOSS_PCT),
    takeProfitPct: optionalFloat(process.env.TAKE_PROFIT_PCT),
    longOnly: process.env.LONG_ONLY === 'true',
  });

  return Object.freeze({
    databaseUrl: baseConfig.databaseUrl || undefined,
    timezone: baseConfig.timezone,
    dataSource: baseConfig.dataSource,
    csvPath: baseConfig.csvPath,
    exchangeBaseUrl: baseConfig.exchangeBaseUrl,
    exchangePageLimit: baseConfig.exchangePageLimit,
    resultsDir: baseConfig.resultsDir,
    engine,
  });
}
