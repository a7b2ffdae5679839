export * from './movingAverages';
export * from './volatility';
export * from './directional';
export * from './momentum';
export * from './timeframes';
