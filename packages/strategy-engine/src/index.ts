/**
 * Strategy engine turns declarative entry/exit conditions into boolean
 * signals and owns the stored strategy definitions.
 */
export * from './ConditionEvaluator';
export * from './timeframe';
export * from './validation';
export * from './StrategyStore';
