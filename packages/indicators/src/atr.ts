export interface AtrInput {
	high: number;
	low: number;
	close: number;
}

/**
 * Wilder-smoothed average true range. The first value lands on index
 * `period`, since the first true range needs a previous close.
 */
export function calculateATRSeries(candles: AtrInput[], period = 14): number[] {
	const series = new Array<number>(candles.length).fill(NaN);
	if (period <= 0 || candles.length < period + 1) {
		return series;
	}

	const trueRanges = computeTrueRanges(candles);
	let atr =
		trueRanges.slice(0, period).reduce((acc, value) => acc + value, 0) / period;
	series[period] = atr;

	for (let i = period; i < trueRanges.length; i += 1) {
		atr = (atr * (period - 1) + trueRanges[i]) / period;
		series[i + 1] = atr;
	}

	return series;
}

const computeTrueRanges = (candles: AtrInput[]): number[] => {
	const trueRanges: number[] = [];
	for (let i = 1; i < candles.length; i += 1) {
		const current = candles[i];
		const previousClose = candles[i - 1].close;
		const highLow = current.high - current.low;
		const highClose = Math.abs(current.high - previousClose);
		const lowClose = Math.abs(current.low - previousClose);
		trueRanges.push(Math.max(highLow, highClose, lowClose));
	}
	return trueRanges;
};
