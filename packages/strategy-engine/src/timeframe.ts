import {
  DEFAULT_TIMEFRAME,
  formatTimeframe,
  timeframeToMinutes,
  type Condition,
  type StrategyDefinition
} from '@tradeloop/core';

type TimeframeSource = Pick<StrategyDefinition, 'entryConditions' | 'exitConditions'>;

const conditionTimeframe = (condition: Condition): string =>
  condition.timeframe === undefined || condition.timeframe.trim() === ''
    ? DEFAULT_TIMEFRAME
    : condition.timeframe;

/**
 * Smallest sampling interval, in minutes, across entry and exit conditions.
 * Conditions without a timeframe count as one day.
 */
export const resolveTimeframeMinutes = (strategy: TimeframeSource): number => {
  const conditions = [...strategy.entryConditions, ...strategy.exitConditions];
  if (conditions.length === 0) {
    return timeframeToMinutes(DEFAULT_TIMEFRAME);
  }
  return Math.min(
    ...conditions.map((condition) => timeframeToMinutes(conditionTimeframe(condition)))
  );
};

export const resolveTimeframe = (strategy: TimeframeSource): string =>
  formatTimeframe(resolveTimeframeMinutes(strategy));
