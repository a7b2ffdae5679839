export * from './OptimizationTypes';
export * from './ParameterSpace';
export * from './WalkForwardOptimizer';
export * from './OptimizationReport';
export * from './OptimizationResultWriter';
export * from './OptimizerResultStore';
export * from './OptimizerRunner';
