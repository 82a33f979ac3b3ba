import { describe, expect, it, vi } from "vitest";
import type { MarketDataClient, StrategyDefinition } from "@tradeloop/core";
import { InMemoryStore } from "@tradeloop/persistence";
import type { ReconciliationResult } from "@tradeloop/reconciliation";
import { TradeLifecycle } from "@tradeloop/trade-lifecycle";

import { ReconciliationScheduler } from "./reconciliationScheduler";

const strategy = (id: string, assets: string[]): StrategyDefinition => ({
	id,
	title: id,
	assets,
	marketType: "futures",
	entryConditions: [],
	exitConditions: [],
	tradeParameters: { leverage: 1, orderType: "market", positionSize: 1 },
	riskParameters: { stopLossPct: 0, takeProfitPct: 0, trailingStopPct: 0 },
});

const emptyResult = (strategyId: string): ReconciliationResult => ({
	strategyId,
	additions: [],
	updates: [],
	removals: [],
	unchanged: [],
	skipped: 0,
});

const marketData: MarketDataClient = {
	fetchOHLCV: async () => [],
	fetchTicker: vi.fn(async (asset: string) => {
		if (asset === "DOGE/USDT") {
			throw new Error("ticker timeout");
		}
		return { symbol: asset, last: 10, high: null, low: null, baseVolume: null };
	}),
};

describe("ReconciliationScheduler.runCycle", () => {
	it("reconciles each strategy against its priced assets and budget", async () => {
		const reconcile = vi.fn(async (target: StrategyDefinition) => emptyResult(target.id));
		const scheduler = new ReconciliationScheduler({
			strategies: {
				getActiveStrategies: async () => [strategy("s1", ["BTC/USDT", "DOGE/USDT"])],
			},
			marketData,
			reconciler: { reconcile },
			budgets: { getBudget: async (strategyId) => (strategyId === "s1" ? 750 : 0) },
			lifecycle: new TradeLifecycle(new InMemoryStore()),
		});

		const [result] = await scheduler.runCycle();

		expect(reconcile).toHaveBeenCalledWith(
			expect.objectContaining({ id: "s1" }),
			{
				"BTC/USDT": {
					symbol: "BTC/USDT",
					last: 10,
					high: null,
					low: null,
					baseVolume: null,
				},
			},
			750
		);
		expect(marketData.fetchTicker).toHaveBeenCalledWith("BTC/USDT", "futures");
		expect(result.reconciliation).toEqual(emptyResult("s1"));
		expect(result.performance).toMatchObject({ strategyId: "s1", trades: 0 });
	});

	it("reconciles against available budget plus what filled trades hold", async () => {
		const lifecycle = new TradeLifecycle(new InMemoryStore());
		for (const [tradeId, status] of [
			["t1", "active"],
			["t2", "pending"],
		] as const) {
			await lifecycle.create({
				tradeId,
				strategyId: "s1",
				asset: "BTC/USDT",
				side: "buy",
				amount: 1,
				entryPrice: 100,
				budgetAllocation: 100,
			});
			if (status === "active") {
				await lifecycle.activate(tradeId);
			}
		}
		const reconcile = vi.fn(async (target: StrategyDefinition) => emptyResult(target.id));
		const scheduler = new ReconciliationScheduler({
			strategies: { getActiveStrategies: async () => [strategy("s1", [])] },
			marketData,
			reconciler: { reconcile },
			budgets: { getBudget: async () => 500 },
			lifecycle,
		});

		await scheduler.runCycle();

		expect(reconcile).toHaveBeenCalledWith(expect.objectContaining({ id: "s1" }), {}, 600);
	});

	it("reports a failed strategy and still reconciles the rest", async () => {
		const reconcile = vi.fn(async (target: StrategyDefinition) => {
			if (target.id === "bad") {
				throw new Error("suggestions offline");
			}
			return emptyResult(target.id);
		});
		const scheduler = new ReconciliationScheduler({
			strategies: {
				getActiveStrategies: async () => [
					strategy("bad", ["BTC/USDT"]),
					strategy("good", ["BTC/USDT"]),
				],
			},
			marketData,
			reconciler: { reconcile },
			budgets: { getBudget: async () => 100 },
			lifecycle: new TradeLifecycle(new InMemoryStore()),
		});

		const results = await scheduler.runCycle();

		expect(results.map((result) => [result.strategyId, result.error])).toEqual([
			["bad", "suggestions offline"],
			["good", undefined],
		]);
		expect(results[1].reconciliation).toEqual(emptyResult("good"));
	});

	it("logs performance from the strategy's closed trades", async () => {
		const lifecycle = new TradeLifecycle(new InMemoryStore());
		await lifecycle.create({
			tradeId: "t1",
			strategyId: "s1",
			asset: "BTC/USDT",
			side: "buy",
			amount: 1,
			entryPrice: 100,
			budgetAllocation: 100,
		});
		await lifecycle.activate("t1");
		await lifecycle.close("t1", { reason: "exit_signal", exitPrice: 110, realizedPnl: 10 });
		const scheduler = new ReconciliationScheduler({
			strategies: { getActiveStrategies: async () => [strategy("s1", [])] },
			marketData,
			reconciler: { reconcile: async () => emptyResult("s1") },
			budgets: { getBudget: async () => 0 },
			lifecycle,
		});

		const [result] = await scheduler.runCycle();

		expect(result.performance).toEqual({
			strategyId: "s1",
			trades: 1,
			wins: 1,
			losses: 0,
			totalPnl: 10,
			roi: 10,
			winRate: 100,
			avgProfit: 10,
			maxDrawdown: 0,
		});
	});
});
