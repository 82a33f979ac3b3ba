import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import {
	loadExchangeConfig,
	loadMonitorConfig,
	loadStrategyFiles,
	type EnvConfig,
} from "./config";

const FIXTURE_DIR = path.join(
	path.dirname(fileURLToPath(import.meta.url)),
	"__tests__",
	"fixtures"
);

const env: EnvConfig = {
	exchangeId: "bitget",
	executionMode: "paper",
	apiKey: "test-key",
	apiSecret: "test-secret",
	apiPassword: "test-password",
	storeDriver: "memory",
	storePath: "data/store.json",
	monitorProfile: "default",
};

describe("loadMonitorConfig", () => {
	it("fills defaults for optional fields", () => {
		expect(loadMonitorConfig(FIXTURE_DIR, "default")).toEqual({
			pollIntervalMs: 1000,
			reconcileIntervalMs: 5000,
			ohlcvLimit: 120,
			maxRetries: 3,
			defaultBudget: 500,
			paperStartingBalance: 0,
		});
	});

	it("names the missing field", () => {
		expect(() => loadMonitorConfig(FIXTURE_DIR, "broken")).toThrowError(
			"Required numeric field missing in monitor.reconcileIntervalMs"
		);
	});
});

describe("loadExchangeConfig", () => {
	it("merges credentials from the environment", () => {
		const config = loadExchangeConfig(env, FIXTURE_DIR);
		expect(config).toEqual({
			id: "bitget",
			exchange: "bitget",
			defaultMarketType: "futures",
			testnet: true,
			credentials: {
				apiKey: "test-key",
				apiSecret: "test-secret",
				password: "test-password",
			},
		});
	});

	it("rejects an unknown market type", () => {
		expect(() => loadExchangeConfig(env, FIXTURE_DIR, "weird")).toThrowError(
			/Unsupported defaultMarketType "options"/
		);
	});
});

describe("loadStrategyFiles", () => {
	it("reads json files in name order", () => {
		const files = loadStrategyFiles(FIXTURE_DIR);
		expect(files.map((file) => path.basename(file.path))).toEqual([
			"a-first.json",
			"b-second.json",
		]);
		expect(files[0]?.contents).toEqual({ id: "first" });
	});

	it("returns nothing when the directory is absent", () => {
		expect(loadStrategyFiles(path.join(FIXTURE_DIR, "missing"))).toEqual([]);
	});
});
