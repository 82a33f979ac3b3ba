import { ema, emaOfDefined } from './ema';

export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

export function macd(
  closes: number[],
  fast = 12,
  slow = 26,
  signalLength = 9
): MacdSeries {
  const empty = (): number[] => new Array<number>(closes.length).fill(NaN);
  if (fast <= 0 || slow <= 0 || signalLength <= 0) {
    return { macd: empty(), signal: empty(), histogram: empty() };
  }

  const fastSeries = ema(closes, fast);
  const slowSeries = ema(closes, slow);
  const macdSeries = fastSeries.map((fastValue, index) => fastValue - slowSeries[index]);
  const signalSeries = emaOfDefined(macdSeries, signalLength);
  const histogram = macdSeries.map((value, index) => value - signalSeries[index]);

  return {
    macd: macdSeries,
    signal: signalSeries,
    histogram
  };
}
