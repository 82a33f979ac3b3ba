import {
	ConfigurationError,
	type Candle,
	type IndicatorParameters,
} from "@tradeloop/core";

import { calculateATRSeries } from "./atr";
import { ema } from "./ema";
import {
	bollingerBands,
	cci,
	momentum,
	obv,
	roc,
	stddev,
	stochastic,
	williamsR,
	wma,
} from "./extended";
import { macd } from "./macd";
import { rsiSeries } from "./rsi";
import { sma } from "./sma";
import { calculateRollingVWAPSeries, calculateSessionVWAPSeries } from "./vwap";

export interface IndicatorColumn {
	name: string;
	values: number[];
}

/** Ordered columns; single-series indicators carry exactly one. */
export type IndicatorOutput = IndicatorColumn[];

export type ProviderResult =
	| { ok: true; output: IndicatorOutput }
	| { ok: false; reason: "not_found" };

export interface IndicatorProvider {
	readonly name: string;
	compute(
		indicator: string,
		candles: Candle[],
		params: IndicatorParameters
	): ProviderResult;
}

export type IndicatorFn = (
	candles: Candle[],
	params: IndicatorParameters
) => IndicatorOutput;

/**
 * Reads the first of `keys` present in `params`. Numeric strings are
 * accepted; anything else is a corrupt definition.
 */
export const numericParam = (
	params: IndicatorParameters,
	keys: string[],
	fallback: number
): number => {
	for (const key of keys) {
		const raw = params[key];
		if (raw === undefined) {
			continue;
		}
		const value = typeof raw === "string" ? Number(raw) : raw;
		if (typeof value !== "number" || !Number.isFinite(value)) {
			throw new ConfigurationError(
				`Indicator parameter "${key}" must be numeric, got ${JSON.stringify(raw)}`
			);
		}
		return value;
	}
	return fallback;
};

const PERIOD_KEYS = ["period", "length", "timeperiod"];

const period = (params: IndicatorParameters, fallback: number): number =>
	numericParam(params, PERIOD_KEYS, fallback);

const closes = (candles: Candle[]): number[] =>
	candles.map((candle) => candle.close);

const single = (name: string, values: number[]): IndicatorOutput => [
	{ name, values },
];

export const createRegistryProvider = (
	name: string,
	registry: Record<string, IndicatorFn>
): IndicatorProvider => {
	const entries = new Map(
		Object.entries(registry).map(([key, fn]) => [key.toLowerCase(), fn])
	);
	return {
		name,
		compute: (indicator, candles, params) => {
			const fn = entries.get(indicator.toLowerCase());
			if (!fn) {
				return { ok: false, reason: "not_found" };
			}
			return { ok: true, output: fn(candles, params) };
		},
	};
};

export const CORE_INDICATORS: Record<string, IndicatorFn> = {
	sma: (candles, params) => single("sma", sma(closes(candles), period(params, 20))),
	ema: (candles, params) => single("ema", ema(closes(candles), period(params, 20))),
	rsi: (candles, params) =>
		single("rsi", rsiSeries(closes(candles), period(params, 14))),
	macd: (candles, params) => {
		const result = macd(
			closes(candles),
			numericParam(params, ["fast", "fastPeriod", "fastperiod"], 12),
			numericParam(params, ["slow", "slowPeriod", "slowperiod"], 26),
			numericParam(params, ["signal", "signalPeriod", "signalperiod"], 9)
		);
		return [
			{ name: "macd", values: result.macd },
			{ name: "signal", values: result.signal },
			{ name: "histogram", values: result.histogram },
		];
	},
	atr: (candles, params) =>
		single("atr", calculateATRSeries(candles, period(params, 14))),
	vwap: (candles, params) => {
		const window = period(params, 0);
		return single(
			"vwap",
			window > 0
				? calculateRollingVWAPSeries(candles, window)
				: calculateSessionVWAPSeries(candles)
		);
	},
	open: (candles) => single("open", candles.map((candle) => candle.open)),
	high: (candles) => single("high", candles.map((candle) => candle.high)),
	low: (candles) => single("low", candles.map((candle) => candle.low)),
	volume: (candles) => single("volume", candles.map((candle) => candle.volume)),
};

const bbands: IndicatorFn = (candles, params) => {
	const bands = bollingerBands(
		closes(candles),
		period(params, 20),
		numericParam(params, ["stdDev", "stddev", "devfactor", "nbdev"], 2)
	);
	return [
		{ name: "lower", values: bands.lower },
		{ name: "middle", values: bands.middle },
		{ name: "upper", values: bands.upper },
	];
};

export const EXTENDED_INDICATORS: Record<string, IndicatorFn> = {
	bbands,
	bollinger: bbands,
	stddev: (candles, params) =>
		single("stddev", stddev(closes(candles), period(params, 20))),
	roc: (candles, params) => single("roc", roc(closes(candles), period(params, 12))),
	momentum: (candles, params) =>
		single("momentum", momentum(closes(candles), period(params, 10))),
	obv: (candles) =>
		single(
			"obv",
			obv(
				closes(candles),
				candles.map((candle) => candle.volume)
			)
		),
	stoch: (candles, params) => {
		const result = stochastic(
			candles,
			numericParam(params, ["k", "kPeriod", ...PERIOD_KEYS], 14),
			numericParam(params, ["d", "dPeriod"], 3)
		);
		return [
			{ name: "k", values: result.k },
			{ name: "d", values: result.d },
		];
	},
	wma: (candles, params) => single("wma", wma(closes(candles), period(params, 20))),
	cci: (candles, params) => single("cci", cci(candles, period(params, 20))),
	willr: (candles, params) =>
		single("willr", williamsR(candles, period(params, 14))),
};

export const coreIndicatorProvider = createRegistryProvider(
	"core",
	CORE_INDICATORS
);

export const extendedIndicatorProvider = createRegistryProvider(
	"extended",
	EXTENDED_INDICATORS
);

export const DEFAULT_INDICATOR_PROVIDERS: readonly IndicatorProvider[] = [
	coreIndicatorProvider,
	extendedIndicatorProvider,
];
