/**
 * Simple moving average aligned with the input; NaN until `period` samples
 * are available.
 */
export function sma(values: number[], period: number): number[] {
	const series = new Array<number>(values.length).fill(NaN);
	if (period <= 0 || values.length < period) {
		return series;
	}

	let sum = 0;
	for (let i = 0; i < values.length; i += 1) {
		sum += values[i];
		if (i >= period) {
			sum -= values[i - period];
		}
		if (i >= period - 1) {
			series[i] = sum / period;
		}
	}
	return series;
}
