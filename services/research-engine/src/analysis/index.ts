export * from './RobustnessAnalyzer';
