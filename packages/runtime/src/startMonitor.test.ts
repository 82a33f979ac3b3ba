import { describe, expect, it } from "vitest";
import type {
	Candle,
	ExchangeOrder,
	MarketDataClient,
	OrderGateway,
	TradeloopConfig,
} from "@tradeloop/core";
import { InMemoryStore } from "@tradeloop/persistence";

import { startMonitor } from "./startMonitor";

const config: TradeloopConfig = {
	env: {
		exchangeId: "bitget",
		executionMode: "paper",
		apiKey: "",
		apiSecret: "",
		apiPassword: "",
		storeDriver: "memory",
		storePath: "data/store.json",
		monitorProfile: "default",
	},
	exchange: {
		id: "bitget",
		exchange: "bitget",
		defaultMarketType: "spot",
		testnet: true,
		credentials: { apiKey: "", apiSecret: "", password: "" },
	},
	monitor: {
		pollIntervalMs: 1_000,
		reconcileIntervalMs: 5_000,
		ohlcvLimit: 10,
		maxRetries: 3,
		defaultBudget: 600,
		paperStartingBalance: 1_000,
	},
	configDir: "config",
	workspaceRoot: ".",
};

class StaticExchange implements MarketDataClient, OrderGateway {
	readonly liveOrders: string[] = [];

	async fetchOHLCV(asset: string, timeframe: string): Promise<Candle[]> {
		return [100, 120].map((close, index) => ({
			symbol: asset,
			timeframe,
			timestamp: index * 3_600_000,
			open: close,
			high: close,
			low: close,
			close,
			volume: 1,
		}));
	}

	async fetchTicker(asset: string) {
		return { symbol: asset, last: 120, high: null, low: null, baseVolume: null };
	}

	async createOrder(): Promise<ExchangeOrder> {
		this.liveOrders.push("create");
		throw new Error("live routing disabled in paper mode");
	}

	async fetchOrder(): Promise<ExchangeOrder> {
		throw new Error("live routing disabled in paper mode");
	}
}

const trendStrategy = (assets: string[]) => ({
	id: "trend",
	title: "Trend",
	assets,
	marketType: "spot",
	entryConditions: [{ indicator: "close", operator: ">", value: 110, timeframe: "1h" }],
	exitConditions: [{ indicator: "close", operator: "<", value: 50, timeframe: "1h" }],
	tradeParameters: { positionSize: 1 },
});

const pausedMonitor = () =>
	startMonitor({
		config,
		store: new InMemoryStore(),
		exchange: new StaticExchange(),
		autoStart: false,
	});

describe("startMonitor", () => {
	it("wires a paper monitor that opens positions from stored strategies", async () => {
		const exchange = new StaticExchange();
		const runtime = startMonitor({
			config,
			store: new InMemoryStore(),
			exchange,
			autoStart: false,
		});
		await runtime.strategies.save({
			id: "trend",
			title: "Trend",
			assets: ["BTC/USDT"],
			marketType: "spot",
			entryConditions: [{ indicator: "close", operator: ">", value: 110, timeframe: "1h" }],
			exitConditions: [{ indicator: "close", operator: "<", value: 50, timeframe: "1h" }],
			tradeParameters: { positionSize: 1 },
		});
		await runtime.strategies.activate("trend");

		const summary = await runtime.loop.runPass();

		expect(summary).toMatchObject({ strategies: 1, assets: 1, entrySignals: 1, failures: 0 });
		const [trade] = await runtime.lifecycle.list("active");
		expect(trade).toMatchObject({
			strategyId: "trend",
			asset: "BTC/USDT",
			amount: 1,
			entryPrice: 120,
			budgetAllocation: 120,
		});
		expect(await runtime.budgets.getBudget("trend")).toBe(480);
		expect(exchange.liveOrders).toEqual([]);

		await runtime.stop();
	});

	it("keeps a signal-opened trade through the next reconcile cycle", async () => {
		const runtime = pausedMonitor();
		await runtime.strategies.save(trendStrategy(["BTC/USDT"]));
		await runtime.strategies.activate("trend");
		await runtime.loop.runPass();
		const [opened] = await runtime.lifecycle.list("active");

		const [cycle] = await runtime.scheduler.runCycle();

		expect(cycle.error).toBeUndefined();
		expect(cycle.reconciliation?.additions).toEqual([]);
		expect(cycle.reconciliation?.removals).toEqual([]);
		expect(await runtime.lifecycle.list("active")).toEqual([
			expect.objectContaining({ tradeId: opened.tradeId, amount: 1, budgetAllocation: 120 }),
		]);
		expect(await runtime.budgets.getBudget("trend")).toBe(480);

		await runtime.stop();
	});

	it("closes a filled trade reconciliation drops and returns its allocation", async () => {
		const runtime = pausedMonitor();
		await runtime.strategies.save(trendStrategy(["BTC/USDT"]));
		await runtime.strategies.activate("trend");
		await runtime.loop.runPass();
		const [opened] = await runtime.lifecycle.list("active");
		await runtime.strategies.update("trend", trendStrategy(["ETH/USDT"]));

		const [cycle] = await runtime.scheduler.runCycle();

		expect(cycle.reconciliation?.removals.map((trade) => trade.tradeId)).toEqual([
			opened.tradeId,
		]);
		expect(await runtime.lifecycle.get(opened.tradeId)).toMatchObject({
			status: "closed",
			closeReason: "reconciled_out",
			exitPrice: 120,
			realizedPnl: 0,
		});
		expect(await runtime.budgets.getBudget("trend")).toBe(600);

		await runtime.stop();
	});

	it("removes a strategy with its budget only once it has no open trades", async () => {
		const runtime = pausedMonitor();
		await runtime.strategies.save(trendStrategy(["BTC/USDT"]));
		await runtime.strategies.activate("trend");
		await runtime.budgets.setBudget("trend", 900);
		await runtime.loop.runPass();

		await expect(runtime.removeStrategy("trend")).rejects.toThrowError(
			'Strategy "trend" still has 1 open trade(s); close them first'
		);

		const [opened] = await runtime.lifecycle.list("active");
		await runtime.executor.closeTrade(opened, "closed");
		await runtime.removeStrategy("trend");

		expect(await runtime.strategies.list()).toEqual([]);
		expect(await runtime.store.get("budget:trend")).toBeNull();
		expect(await runtime.budgets.getBudget("trend")).toBe(600);

		await runtime.stop();
	});
});
