export * from './types';
export * from './BaseStrategy';
export * from './SmaCrossStrategy';
export * from './VolatilityAdjustedStrategy';
export * from './BollingerBandStrategy';
export * from './StrategyFactory';
