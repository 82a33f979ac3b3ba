/**
 * Timeframe utilities. A timeframe is a positive integer count followed by a
 * unit: "m" (minutes), "h" (hours) or "d" (days).
 */
import { UnsupportedTimeframeError } from "../errors";

export type TimeframeUnit = "m" | "h" | "d";

export interface ParsedTimeframe {
	unit: TimeframeUnit;
	n: number;
	minutes: number;
	ms: number;
}

export const MINUTE_MS = 60_000;
export const MINUTES_PER_UNIT: Record<TimeframeUnit, number> = {
	m: 1,
	h: 60,
	d: 1_440,
};

export const DEFAULT_TIMEFRAME = "1d";

const isTimeframeUnit = (value: string): value is TimeframeUnit =>
	Object.prototype.hasOwnProperty.call(MINUTES_PER_UNIT, value);

/**
 * Parse a timeframe string into its count, unit and duration.
 * @throws UnsupportedTimeframeError for a malformed string, a non-positive
 * count or a unit other than m/h/d
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (typeof timeframe !== "string") {
		throw new UnsupportedTimeframeError(
			String(timeframe),
			`expected string, got ${typeof timeframe}`
		);
	}
	const trimmed = timeframe.trim();
	const match = trimmed.match(/^(-?\d+)([a-zA-Z]+)$/);
	if (!match) {
		throw new UnsupportedTimeframeError(
			timeframe,
			'expected format like "15m", "4h", "1d"'
		);
	}

	const n = Number.parseInt(match[1], 10);
	const unit = match[2];
	if (n <= 0) {
		throw new UnsupportedTimeframeError(
			timeframe,
			`period must be positive, got ${n}`
		);
	}
	if (!isTimeframeUnit(unit)) {
		throw new UnsupportedTimeframeError(timeframe, `unknown unit "${unit}"`);
	}

	const minutes = n * MINUTES_PER_UNIT[unit];
	return { unit, n, minutes, ms: minutes * MINUTE_MS };
};

export const timeframeToMinutes = (timeframe: string): number =>
	parseTimeframe(timeframe).minutes;

export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * Render a minute count with the coarsest unit that represents it exactly:
 * 90 -> "90m", 120 -> "2h", 2880 -> "2d".
 */
export const formatTimeframe = (minutes: number): string => {
	if (!Number.isInteger(minutes) || minutes <= 0) {
		throw new UnsupportedTimeframeError(
			String(minutes),
			"minute count must be a positive integer"
		);
	}
	if (minutes % MINUTES_PER_UNIT.d === 0) {
		return `${minutes / MINUTES_PER_UNIT.d}d`;
	}
	if (minutes % MINUTES_PER_UNIT.h === 0) {
		return `${minutes / MINUTES_PER_UNIT.h}h`;
	}
	return `${minutes}m`;
};
