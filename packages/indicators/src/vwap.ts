export interface VwapCandle {
	timestamp: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

const typicalPrice = (candle: VwapCandle): number =>
	(candle.high + candle.low + candle.close) / 3;

const startOfUtcDay = (timestamp: number): number => {
	const date = new Date(timestamp);
	return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
};

/**
 * Session VWAP that resets at each UTC day boundary. Samples stay NaN until
 * the session has traded volume.
 */
export const calculateSessionVWAPSeries = (candles: VwapCandle[]): number[] => {
	const series = new Array<number>(candles.length).fill(NaN);
	let session = Number.NaN;
	let pvSum = 0;
	let volumeSum = 0;

	candles.forEach((candle, index) => {
		const day = startOfUtcDay(candle.timestamp);
		if (day !== session) {
			session = day;
			pvSum = 0;
			volumeSum = 0;
		}
		if (candle.volume > 0) {
			pvSum += typicalPrice(candle) * candle.volume;
			volumeSum += candle.volume;
		}
		if (volumeSum > 0) {
			series[index] = pvSum / volumeSum;
		}
	});

	return series;
};

export const calculateRollingVWAPSeries = (
	candles: VwapCandle[],
	period: number
): number[] => {
	const series = new Array<number>(candles.length).fill(NaN);
	if (period <= 0) {
		return series;
	}
	for (let i = period - 1; i < candles.length; i += 1) {
		let pvSum = 0;
		let volumeSum = 0;
		for (let j = i - period + 1; j <= i; j += 1) {
			const candle = candles[j];
			if (candle.volume <= 0) {
				continue;
			}
			pvSum += typicalPrice(candle) * candle.volume;
			volumeSum += candle.volume;
		}
		if (volumeSum > 0) {
			series[i] = pvSum / volumeSum;
		}
	}
	return series;
};
