import { describe, expect, it } from "vitest";
import { ema } from "./ema";
import { macd } from "./macd";
import { momentum, obv, roc, stochastic, wma } from "./extended";
import { rsiSeries } from "./rsi";
import { sma } from "./sma";

describe("moving averages", () => {
	it("aligns sma with the input and pads the warm-up", () => {
		expect(sma([1, 2, 3, 4, 5], 3)).toEqual([NaN, NaN, 2, 3, 4]);
	});

	it("seeds ema with the simple average of the first window", () => {
		expect(ema([1, 2, 3, 4, 5], 3)).toEqual([NaN, NaN, 2, 3, 4]);
	});

	it("weights recent samples linearly in wma", () => {
		const series = wma([1, 2, 3], 3);
		expect(series[2]).toBeCloseTo(14 / 6, 10);
	});

	it("returns all NaN when the window is longer than the data", () => {
		expect(sma([1, 2], 5)).toEqual([NaN, NaN]);
	});
});

describe("oscillators", () => {
	it("pins rsi at 100 for a steadily rising series", () => {
		const series = rsiSeries([1, 2, 3, 4, 5, 6], 3);
		expect(series.slice(0, 3)).toEqual([NaN, NaN, NaN]);
		expect(series.slice(3)).toEqual([100, 100, 100]);
	});

	it("computes macd, signal and histogram columns of equal length", () => {
		const closes = Array.from({ length: 40 }, (_, i) => 100 + i);
		const result = macd(closes, 3, 6, 3);
		expect(result.macd).toHaveLength(40);
		expect(Number.isNaN(result.macd[4])).toBe(true);
		expect(Number.isFinite(result.macd[5])).toBe(true);
		expect(Number.isNaN(result.signal[6])).toBe(true);
		expect(Number.isFinite(result.signal[7])).toBe(true);
		expect(result.histogram[39]).toBeCloseTo(
			result.macd[39] - result.signal[39],
			10
		);
	});

	it("measures momentum and rate of change over the period", () => {
		expect(momentum([1, 3, 6, 10], 2)).toEqual([NaN, NaN, 5, 7]);
		const change = roc([100, 110, 121], 1);
		expect(change[1]).toBeCloseTo(10, 10);
		expect(change[2]).toBeCloseTo(10, 10);
	});

	it("accumulates on-balance volume by close direction", () => {
		expect(obv([10, 11, 10, 10, 12], [5, 6, 7, 8, 9])).toEqual([
			0, 6, -1, -1, 8,
		]);
	});

	it("places %K at the top of the range on a new high", () => {
		const bars = [
			{ high: 10, low: 5, close: 6 },
			{ high: 11, low: 6, close: 9 },
			{ high: 12, low: 7, close: 12 },
		];
		const { k, d } = stochastic(bars, 3, 1);
		expect(k).toEqual([NaN, NaN, 100]);
		expect(d).toEqual([NaN, NaN, 100]);
	});
});
