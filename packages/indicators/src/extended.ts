/**
 * Oscillators and band indicators for the extended backend. Every function
 * returns arrays the same length as the input, with NaN for indices where the
 * indicator cannot yet be computed (warm-up period).
 */
import { sma } from "./sma";

export interface HighLowClose {
  high: number;
  low: number;
  close: number;
}

/** Population standard deviation over a rolling window. */
export function stddev(data: number[], period: number): number[] {
  const result = new Array<number>(data.length).fill(NaN);
  if (period <= 0) return result;

  const mean = sma(data, period);
  for (let i = period - 1; i < data.length; i++) {
    let sumSq = 0;
    for (let j = i - period + 1; j <= i; j++) {
      const diff = data[j] - mean[i];
      sumSq += diff * diff;
    }
    result[i] = Math.sqrt(sumSq / period);
  }
  return result;
}

/**
 * Bollinger Bands: middle = SMA, upper/lower = middle +/- stdDev * multiplier.
 * Columns are ordered lower, middle, upper.
 */
export function bollingerBands(
  data: number[],
  period = 20,
  stdDevMultiplier = 2,
): { lower: number[]; middle: number[]; upper: number[] } {
  const middle = sma(data, period);
  const deviation = stddev(data, period);
  return {
    lower: middle.map((value, i) => value - stdDevMultiplier * deviation[i]),
    middle,
    upper: middle.map((value, i) => value + stdDevMultiplier * deviation[i]),
  };
}

/** Weighted moving average with linear weights 1..period. */
export function wma(data: number[], period: number): number[] {
  const result = new Array<number>(data.length).fill(NaN);
  if (period <= 0) return result;

  const denominator = (period * (period + 1)) / 2;
  for (let i = period - 1; i < data.length; i++) {
    let sum = 0;
    for (let w = 1; w <= period; w++) {
      sum += data[i - period + w] * w;
    }
    result[i] = sum / denominator;
  }
  return result;
}

/** Rate of change in percent. */
export function roc(data: number[], period: number): number[] {
  const result = new Array<number>(data.length).fill(NaN);
  if (period <= 0) return result;

  for (let i = period; i < data.length; i++) {
    const base = data[i - period];
    result[i] = base === 0 ? NaN : ((data[i] - base) / base) * 100;
  }
  return result;
}

export function momentum(data: number[], period: number): number[] {
  const result = new Array<number>(data.length).fill(NaN);
  if (period <= 0) return result;

  for (let i = period; i < data.length; i++) {
    result[i] = data[i] - data[i - period];
  }
  return result;
}

/** On-balance volume, starting at 0 on the first bar. */
export function obv(closes: number[], volumes: number[]): number[] {
  if (closes.length === 0) return [];

  const result = new Array<number>(closes.length);
  result[0] = 0;
  for (let i = 1; i < closes.length; i++) {
    const direction = Math.sign(closes[i] - closes[i - 1]);
    result[i] = result[i - 1] + direction * volumes[i];
  }
  return result;
}

const highestHigh = (bars: HighLowClose[], end: number, period: number): number => {
  let value = -Infinity;
  for (let j = end - period + 1; j <= end; j++) value = Math.max(value, bars[j].high);
  return value;
};

const lowestLow = (bars: HighLowClose[], end: number, period: number): number => {
  let value = Infinity;
  for (let j = end - period + 1; j <= end; j++) value = Math.min(value, bars[j].low);
  return value;
};

/**
 * Stochastic oscillator. %K is the raw position of the close inside the
 * high/low range, %D its simple moving average.
 */
export function stochastic(
  bars: HighLowClose[],
  period = 14,
  dPeriod = 3,
): { k: number[]; d: number[] } {
  const k = new Array<number>(bars.length).fill(NaN);
  if (period > 0) {
    for (let i = period - 1; i < bars.length; i++) {
      const high = highestHigh(bars, i, period);
      const low = lowestLow(bars, i, period);
      const range = high - low;
      k[i] = range === 0 ? 50 : ((bars[i].close - low) / range) * 100;
    }
  }

  const d = new Array<number>(bars.length).fill(NaN);
  const firstValid = k.findIndex((value) => !Number.isNaN(value));
  if (firstValid !== -1) {
    const smoothed = sma(k.slice(firstValid), dPeriod);
    for (let i = 0; i < smoothed.length; i++) d[firstValid + i] = smoothed[i];
  }
  return { k, d };
}

/** Williams %R, in [-100, 0]. */
export function williamsR(bars: HighLowClose[], period = 14): number[] {
  const result = new Array<number>(bars.length).fill(NaN);
  if (period <= 0) return result;

  for (let i = period - 1; i < bars.length; i++) {
    const high = highestHigh(bars, i, period);
    const low = lowestLow(bars, i, period);
    const range = high - low;
    result[i] = range === 0 ? -50 : ((high - bars[i].close) / range) * -100;
  }
  return result;
}

/** Commodity Channel Index using the 0.015 Lambert constant. */
export function cci(bars: HighLowClose[], period = 20): number[] {
  const result = new Array<number>(bars.length).fill(NaN);
  if (period <= 0) return result;

  const typical = bars.map((bar) => (bar.high + bar.low + bar.close) / 3);
  const mean = sma(typical, period);
  for (let i = period - 1; i < bars.length; i++) {
    let deviation = 0;
    for (let j = i - period + 1; j <= i; j++) {
      deviation += Math.abs(typical[j] - mean[i]);
    }
    deviation /= period;
    result[i] = deviation === 0 ? 0 : (typical[i] - mean[i]) / (0.015 * deviation);
  }
  return result;
}
