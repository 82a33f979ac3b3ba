import { describe, it, expect } from "vitest";
import { getBooleanArg, getNumberArg, getStringArg, parseCliArgs } from "./cliArgs";

describe("monitor CLI arg parsing", () => {
	it("defaults to the run command", () => {
		const parsed = parseCliArgs(["--profile", "fast"]);
		expect(parsed.command).toBe("run");
		expect(parsed.args.profile).toBe("fast");
	});

	it("captures flags with equals syntax", () => {
		const parsed = parseCliArgs(["import", "--config=./alt", "--activate"]);
		expect(parsed.command).toBe("import");
		expect(getStringArg(parsed.args, "config")).toBe("./alt");
		expect(getBooleanArg(parsed.args, "activate")).toBe(true);
	});

	it("reads budget positionals as strategy and amount", () => {
		const parsed = parseCliArgs(["budget", "trend", "750"]);
		expect(getStringArg(parsed.args, "strategy")).toBe("trend");
		expect(getNumberArg(parsed.args, "amount")).toBe(750);
	});

	it("prefers explicit flags over budget positionals", () => {
		const parsed = parseCliArgs(["budget", "trend", "750", "--amount", "10"]);
		expect(getNumberArg(parsed.args, "amount")).toBe(10);
	});

	it("reads the remove positional as the strategy id", () => {
		const parsed = parseCliArgs(["remove", "trend"]);
		expect(parsed.command).toBe("remove");
		expect(getStringArg(parsed.args, "strategy")).toBe("trend");
	});

	it("rejects unknown commands", () => {
		expect(() => parseCliArgs(["backfill"])).toThrowError(/Unknown command "backfill"/);
	});

	it("rejects non-numeric amounts", () => {
		const parsed = parseCliArgs(["budget", "--strategy", "trend", "--amount", "lots"]);
		expect(() => getNumberArg(parsed.args, "amount")).toThrowError(
			'--amount must be numeric, got "lots"'
		);
	});
});
