import {
	UnsupportedIndicatorError,
	type Candle,
	type IndicatorParameters,
} from "@tradeloop/core";

import {
	DEFAULT_INDICATOR_PROVIDERS,
	type IndicatorOutput,
	type IndicatorProvider,
} from "./providers";

/** Shared by every lookup in a pass; callers must not mutate it. */
export type IndicatorSeries = readonly number[];

const PRICE_REFERENCES = new Set(["price", "close"]);

export const canonicalizeParameters = (params: IndicatorParameters = {}): string =>
	JSON.stringify(
		Object.keys(params)
			.sort()
			.map((key) => [key, params[key]])
	);

export const indicatorCacheKey = (
	name: string,
	params: IndicatorParameters = {}
): string => `${name.trim().toLowerCase()}${canonicalizeParameters(params)}`;

const splitColumn = (name: string): { base: string; column?: string } => {
	const trimmed = name.trim();
	const dot = trimmed.indexOf(".");
	if (dot <= 0) {
		return { base: trimmed };
	}
	return { base: trimmed.slice(0, dot), column: trimmed.slice(dot + 1) };
};

/**
 * Memoizes indicator series for one asset's candle window. Build one per
 * (pass, asset) and drop it when the pass ends.
 */
export class IndicatorCache {
	private readonly outputs = new Map<string, IndicatorOutput>();
	private closeColumn: number[] | null = null;

	constructor(
		private readonly candles: Candle[],
		private readonly providers: readonly IndicatorProvider[] = DEFAULT_INDICATOR_PROVIDERS
	) {}

	get size(): number {
		return this.outputs.size;
	}

	getOrCompute(name: string, params: IndicatorParameters = {}): IndicatorSeries {
		const { base, column } = splitColumn(name);
		if (!column && PRICE_REFERENCES.has(base.toLowerCase())) {
			return this.closes();
		}

		const output = this.computeOutput(base, params);
		if (!column) {
			return output[0]?.values ?? [];
		}
		const selected = output.find(
			(entry) => entry.name.toLowerCase() === column.toLowerCase()
		);
		if (!selected) {
			throw new UnsupportedIndicatorError(name);
		}
		return selected.values;
	}

	private closes(): IndicatorSeries {
		if (!this.closeColumn) {
			this.closeColumn = this.candles.map((candle) => candle.close);
		}
		return this.closeColumn;
	}

	private computeOutput(
		name: string,
		params: IndicatorParameters
	): IndicatorOutput {
		const key = indicatorCacheKey(name, params);
		const cached = this.outputs.get(key);
		if (cached) {
			return cached;
		}

		for (const provider of this.providers) {
			const result = provider.compute(name, this.candles, params);
			if (result.ok) {
				this.outputs.set(key, result.output);
				return result.output;
			}
		}
		throw new UnsupportedIndicatorError(name);
	}
}
