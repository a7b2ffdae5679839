export * from './types';
export * from './PassThroughFilter';
export * from './AdxRegimeFilter';
export * from './MacdMomentumFilter';
