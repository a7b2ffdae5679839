export * from './types';
export * from './metrics';
export * from './BacktestEngine';
export * from './BacktestService';
