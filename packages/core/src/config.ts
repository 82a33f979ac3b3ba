import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { MARKET_TYPES, type MarketType } from "./types";

export type ExecutionMode = "paper" | "live";
export type StoreDriver = "memory" | "file";

export interface EnvConfig {
	exchangeId: string;
	executionMode: ExecutionMode;
	apiKey: string;
	apiSecret: string;
	apiPassword: string;
	storeDriver: StoreDriver;
	storePath: string;
	monitorProfile: string;
}

interface MonitorConfigFile {
	pollIntervalMs?: number;
	reconcileIntervalMs?: number;
	ohlcvLimit?: number;
	maxRetries?: number;
	defaultBudget?: number;
	paperStartingBalance?: number;
}

export interface MonitorConfig {
	pollIntervalMs: number;
	reconcileIntervalMs: number;
	ohlcvLimit: number;
	maxRetries: number;
	defaultBudget: number;
	paperStartingBalance: number;
}

interface ExchangeConfigFile {
	exchange: string;
	defaultMarketType: string;
	testnet: boolean;
}

export interface ExchangeConfig {
	id: string;
	exchange: string;
	defaultMarketType: MarketType;
	testnet: boolean;
	credentials: {
		apiKey: string;
		apiSecret: string;
		password: string;
	};
}

export interface TradeloopConfig {
	env: EnvConfig;
	exchange: ExchangeConfig;
	monitor: MonitorConfig;
	configDir: string;
	workspaceRoot: string;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	monitorProfile?: string;
	exchangeProfile?: string;
}

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const isWorkspaceRoot = (dir: string): boolean => {
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return typeof parsed === "object" && parsed !== null && "workspaces" in parsed;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const getEnvVar = (key: string, fallback: string): string => {
	const value = process.env[key];
	if (value !== undefined && value.trim() !== "") {
		return value.trim();
	}
	return fallback;
};

const normalizeExecutionMode = (value: string): ExecutionMode =>
	value.toLowerCase() === "live" ? "live" : "paper";

const normalizeStoreDriver = (value: string): StoreDriver => {
	const normalized = value.toLowerCase();
	if (normalized === "memory" || normalized === "file") {
		return normalized;
	}
	throw new Error(`Unsupported STORE_DRIVER "${value}" (use memory or file)`);
};

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	return JSON.parse(contents);
};

const asRecord = (value: unknown, source: string): Record<string, unknown> => {
	if (!value || typeof value !== "object" || Array.isArray(value)) {
		throw new Error(`Expected a JSON object in ${source}`);
	}
	return Object.fromEntries(Object.entries(value));
};

const ensureNumber = (value: unknown, field: string): number => {
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new Error(`Required numeric field missing in ${field}`);
	}
	return value;
};

const ensurePositive = (value: unknown, field: string): number => {
	const num = ensureNumber(value, field);
	if (num <= 0) {
		throw new Error(`Field ${field} must be positive, got ${num}`);
	}
	return num;
};

export const loadEnvConfig = (
	envPath = process.env.TRADELOOP_ENV_FILE ??
		path.join(findWorkspaceRoot(), ".env")
): EnvConfig => {
	if (!envLoaded || loadedEnvPath !== envPath) {
		if (fs.existsSync(envPath)) {
			dotenv.config({ path: envPath });
		}
		envLoaded = true;
		loadedEnvPath = envPath;
	}

	return {
		exchangeId: getEnvVar("EXCHANGE_ID", "bitget"),
		executionMode: normalizeExecutionMode(getEnvVar("EXECUTION_MODE", "paper")),
		apiKey: getEnvVar("EXCHANGE_API_KEY", ""),
		apiSecret: getEnvVar("EXCHANGE_API_SECRET", ""),
		apiPassword: getEnvVar("EXCHANGE_API_PASSWORD", ""),
		storeDriver: normalizeStoreDriver(getEnvVar("STORE_DRIVER", "file")),
		storePath: getEnvVar("STORE_PATH", path.join("data", "store.json")),
		monitorProfile: getEnvVar("MONITOR_PROFILE", "default"),
	};
};

export const loadMonitorConfig = (
	configDir = path.join(findWorkspaceRoot(), "config"),
	profile = "default"
): MonitorConfig => {
	const monitorPath = path.join(configDir, "monitor", `${profile}.json`);
	const file: MonitorConfigFile = asRecord(readJsonFile(monitorPath), monitorPath);
	return {
		pollIntervalMs: ensurePositive(file.pollIntervalMs, "monitor.pollIntervalMs"),
		reconcileIntervalMs: ensurePositive(
			file.reconcileIntervalMs,
			"monitor.reconcileIntervalMs"
		),
		ohlcvLimit: ensurePositive(file.ohlcvLimit, "monitor.ohlcvLimit"),
		maxRetries: ensurePositive(file.maxRetries ?? 3, "monitor.maxRetries"),
		defaultBudget: ensureNumber(file.defaultBudget ?? 0, "monitor.defaultBudget"),
		paperStartingBalance: ensureNumber(
			file.paperStartingBalance ?? 0,
			"monitor.paperStartingBalance"
		),
	};
};

const isMarketType = (value: string): value is MarketType =>
	MARKET_TYPES.some((type) => type === value);

export const loadExchangeConfig = (
	env: EnvConfig,
	configDir = path.join(findWorkspaceRoot(), "config"),
	exchangeProfile?: string
): ExchangeConfig => {
	const profile = exchangeProfile ?? env.exchangeId;
	const exchangePath = path.join(configDir, "exchange", `${profile}.json`);
	const raw = asRecord(readJsonFile(exchangePath), exchangePath);
	const file: ExchangeConfigFile = {
		exchange: typeof raw.exchange === "string" ? raw.exchange : profile,
		defaultMarketType:
			typeof raw.defaultMarketType === "string" ? raw.defaultMarketType : "spot",
		testnet: raw.testnet === true,
	};
	if (!isMarketType(file.defaultMarketType)) {
		throw new Error(
			`Unsupported defaultMarketType "${file.defaultMarketType}" in ${exchangePath}`
		);
	}
	return {
		id: profile,
		exchange: file.exchange,
		defaultMarketType: file.defaultMarketType,
		testnet: file.testnet,
		credentials: {
			apiKey: env.apiKey,
			apiSecret: env.apiSecret,
			password: env.apiPassword,
		},
	};
};

/**
 * Read every strategy definition file under `<configDir>/strategies`.
 * Contents are returned unvalidated; the strategy store validates on save.
 */
export const loadStrategyFiles = (
	configDir = path.join(findWorkspaceRoot(), "config")
): Array<{ path: string; contents: unknown }> => {
	const strategyDir = path.join(configDir, "strategies");
	if (!fs.existsSync(strategyDir)) {
		return [];
	}
	return fs
		.readdirSync(strategyDir)
		.filter((file) => file.endsWith(".json"))
		.sort()
		.map((file) => {
			const filePath = path.join(strategyDir, file);
			return { path: filePath, contents: readJsonFile(filePath) };
		});
};

export const loadTradeloopConfig = (
	options: ConfigLoadOptions = {}
): TradeloopConfig => {
	const workspaceRoot = findWorkspaceRoot();
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	const env = loadEnvConfig(options.envPath);
	return {
		env,
		exchange: loadExchangeConfig(env, configDir, options.exchangeProfile),
		monitor: loadMonitorConfig(
			configDir,
			options.monitorProfile ?? env.monitorProfile
		),
		configDir,
		workspaceRoot,
	};
};
