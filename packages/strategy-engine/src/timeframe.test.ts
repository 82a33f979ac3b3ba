import { describe, expect, it } from 'vitest';
import { UnsupportedTimeframeError, type Condition } from '@tradeloop/core';
import { resolveTimeframe, resolveTimeframeMinutes } from './timeframe';

const withTimeframe = (timeframe?: string): Condition => ({
  indicator: 'rsi',
  operator: '<',
  value: 30,
  ...(timeframe === undefined ? {} : { timeframe })
});

const strategyOf = (entry: Array<string | undefined>, exit: Array<string | undefined> = []) => ({
  entryConditions: entry.map(withTimeframe),
  exitConditions: exit.map(withTimeframe)
});

describe('resolveTimeframe', () => {
  it('takes the minimum across entry and exit conditions', () => {
    const strategy = strategyOf(['1h'], ['90m']);
    expect(resolveTimeframeMinutes(strategy)).toBe(60);
    expect(resolveTimeframe(strategy)).toBe('1h');
  });

  it('keeps minutes when the minimum is not a whole hour', () => {
    expect(resolveTimeframe(strategyOf(['2h'], ['90m']))).toBe('90m');
  });

  it('defaults absent timeframes to one day', () => {
    expect(resolveTimeframeMinutes(strategyOf([undefined], [undefined]))).toBe(1440);
    expect(resolveTimeframe(strategyOf([undefined]))).toBe('1d');
    expect(resolveTimeframe(strategyOf([]))).toBe('1d');
  });

  it('lets a short explicit timeframe win over the default', () => {
    expect(resolveTimeframe(strategyOf([undefined, '15m']))).toBe('15m');
  });

  it('collapses to the coarsest exact unit', () => {
    expect(resolveTimeframe(strategyOf(['2d', '36h']))).toBe('36h');
    expect(resolveTimeframe(strategyOf(['120m']))).toBe('2h');
    expect(resolveTimeframe(strategyOf(['48h']))).toBe('2d');
  });

  it('rejects an unknown unit', () => {
    expect(() => resolveTimeframe(strategyOf(['1w']))).toThrow(UnsupportedTimeframeError);
    expect(() => resolveTimeframe(strategyOf(['1h'], ['0m']))).toThrow(UnsupportedTimeframeError);
  });
});
