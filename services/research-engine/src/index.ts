/**
 * Research engine: signal pipelines, backtesting, walk-forward optimization
 * and robustness analysis over historical price series.
 */

export * from './config';
export * from './indicators';
export * from './filters';
export * from './strategies';
export * from './backtesting';
export * from './optimization';
export * from './analysis';
export * from './data';
export * from './db';
