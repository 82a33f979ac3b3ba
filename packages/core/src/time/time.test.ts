import { describe, expect, it } from "vitest";
import { UnsupportedTimeframeError } from "../errors";
import {
	formatTimeframe,
	parseTimeframe,
	timeframeToMinutes,
	timeframeToMs,
} from "./time";

describe("time utilities", () => {
	describe("parseTimeframe", () => {
		it("parses minute, hour and day timeframes", () => {
			expect(parseTimeframe("15m")).toEqual({
				unit: "m",
				n: 15,
				minutes: 15,
				ms: 900_000,
			});
			expect(parseTimeframe("4h")).toEqual({
				unit: "h",
				n: 4,
				minutes: 240,
				ms: 14_400_000,
			});
			expect(parseTimeframe("1d").minutes).toBe(1_440);
		});

		it("tolerates surrounding whitespace", () => {
			expect(timeframeToMinutes(" 5m ")).toBe(5);
			expect(timeframeToMs("\t1h\n")).toBe(3_600_000);
		});

		it("rejects malformed strings", () => {
			expect(() => parseTimeframe("")).toThrow(UnsupportedTimeframeError);
			expect(() => parseTimeframe("5")).toThrow("expected format");
			expect(() => parseTimeframe("m5")).toThrow("expected format");
			expect(() => parseTimeframe("1.5h")).toThrow("expected format");
		});

		it("rejects unknown units", () => {
			expect(() => parseTimeframe("1w")).toThrow('unknown unit "w"');
			expect(() => parseTimeframe("1M")).toThrow('unknown unit "M"');
		});

		it("rejects zero and negative periods", () => {
			expect(() => parseTimeframe("0m")).toThrow(
				"period must be positive, got 0"
			);
			expect(() => parseTimeframe("-5m")).toThrow(
				"period must be positive, got -5"
			);
		});
	});

	describe("formatTimeframe", () => {
		it("collapses to the coarsest exact unit", () => {
			expect(formatTimeframe(90)).toBe("90m");
			expect(formatTimeframe(60)).toBe("1h");
			expect(formatTimeframe(120)).toBe("2h");
			expect(formatTimeframe(1_440)).toBe("1d");
			expect(formatTimeframe(2_880)).toBe("2d");
			expect(formatTimeframe(2_160)).toBe("36h");
		});

		it("rejects non-positive or fractional minute counts", () => {
			expect(() => formatTimeframe(0)).toThrow(UnsupportedTimeframeError);
			expect(() => formatTimeframe(1.5)).toThrow(UnsupportedTimeframeError);
		});
	});
});
