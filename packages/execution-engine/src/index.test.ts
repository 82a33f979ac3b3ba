import { describe, expect, it } from "vitest";
import type {
	ExchangeOrder,
	MarketDataClient,
	MarketType,
	OrderGateway,
	OrderRequest,
	StrategyDefinition,
} from "@tradeloop/core";
import { InMemoryStore } from "@tradeloop/persistence";
import { TradeLifecycle, type CreateTradeInput } from "@tradeloop/trade-lifecycle";

import { BudgetManager, TradeExecutor } from "./index";

class FakeGateway implements OrderGateway {
	readonly requests: OrderRequest[] = [];
	readonly orders = new Map<string, ExchangeOrder>();
	fillPrice = 100;
	rejects: (request: OrderRequest) => boolean = () => false;

	async createOrder(request: OrderRequest): Promise<ExchangeOrder> {
		this.requests.push(request);
		if (this.rejects(request)) {
			throw new Error(`venue rejected ${request.type}`);
		}
		const fills = request.type === "market" || request.type === "limit";
		const order: ExchangeOrder = {
			id: `o${this.requests.length}`,
			timestamp: 5_000 + this.requests.length,
			status: fills ? "closed" : "open",
			asset: request.asset,
			side: request.side,
			type: request.type,
			amount: request.amount,
			average: fills ? this.fillPrice : undefined,
		};
		this.orders.set(order.id, order);
		return order;
	}

	readonly lookups: Array<{ orderId: string; asset: string; marketType?: MarketType }> = [];

	async fetchOrder(
		orderId: string,
		asset: string,
		marketType?: MarketType
	): Promise<ExchangeOrder> {
		this.lookups.push({ orderId, asset, marketType });
		const order = this.orders.get(orderId);
		if (!order) {
			throw new Error(`unknown order ${orderId}`);
		}
		return order;
	}
}

const marketData = (last = 100): MarketDataClient => ({
	fetchOHLCV: async () => [],
	fetchTicker: async (asset) => ({
		symbol: asset,
		last,
		high: null,
		low: null,
		baseVolume: null,
	}),
});

const strategy = (overrides: Partial<StrategyDefinition> = {}): StrategyDefinition => ({
	id: "s1",
	title: "Trend",
	assets: ["BTC/USDT"],
	marketType: "spot",
	entryConditions: [],
	exitConditions: [],
	tradeParameters: { leverage: 1, orderType: "market", positionSize: 5 },
	riskParameters: { stopLossPct: 0, takeProfitPct: 0, trailingStopPct: 0 },
	...overrides,
});

const pendingTrade = (overrides: Partial<CreateTradeInput> = {}): CreateTradeInput => ({
	tradeId: "t1",
	strategyId: "s1",
	asset: "BTC/USDT",
	side: "buy",
	amount: 2,
	entryPrice: 100,
	budgetAllocation: 200,
	orderType: "market",
	...overrides,
});

const setup = (maxRetries?: number) => {
	const store = new InMemoryStore();
	const lifecycle = new TradeLifecycle(store, { maxRetries });
	const budgets = new BudgetManager(store);
	const gateway = new FakeGateway();
	const executor = new TradeExecutor({
		lifecycle,
		gateway,
		marketData: marketData(),
		budgets,
		now: () => 42,
	});
	return { lifecycle, budgets, gateway, executor };
};

describe("TradeExecutor.openPosition", () => {
	it("sizes from budget and price, fills, debits and places protective orders", async () => {
		const { budgets, gateway, executor, lifecycle } = setup();
		await budgets.setBudget("s1", 1000);

		const trade = await executor.openPosition(
			strategy({
				riskParameters: { stopLossPct: 5, takeProfitPct: 10, trailingStopPct: 2 },
			}),
			"BTC/USDT"
		);

		expect(trade).toMatchObject({
			tradeId: "s1:BTC/USDT:42",
			status: "active",
			amount: 5,
			budgetAllocation: 500,
			orderId: "o1",
			orderTimestamp: 5_001,
			stopLoss: 95,
			takeProfit: 110,
			trailingStop: 2,
		});
		expect(await budgets.getBudget("s1")).toBe(500);
		expect(gateway.requests).toEqual([
			{
				asset: "BTC/USDT",
				type: "market",
				side: "buy",
				amount: 5,
				price: null,
				marketType: "spot",
			},
			{
				asset: "BTC/USDT",
				side: "sell",
				amount: 5,
				marketType: "spot",
				type: "stop",
				price: 95,
				params: { stopPrice: 95 },
			},
			{
				asset: "BTC/USDT",
				side: "sell",
				amount: 5,
				marketType: "spot",
				type: "limit",
				price: 110,
			},
			{
				asset: "BTC/USDT",
				side: "sell",
				amount: 5,
				marketType: "spot",
				type: "trailingStop",
				price: null,
				params: { trailingPercent: 2 },
			},
		]);
		expect(await lifecycle.list("active")).toHaveLength(1);
	});

	it("caps the amount at what the budget can buy", async () => {
		const { budgets, executor } = setup();
		await budgets.setBudget("s1", 250);

		const trade = await executor.openPosition(strategy(), "BTC/USDT");

		expect(trade?.amount).toBe(2.5);
		expect(await budgets.getBudget("s1")).toBe(0);
	});

	it("does nothing without budget", async () => {
		const { gateway, executor, lifecycle } = setup();

		expect(await executor.openPosition(strategy(), "BTC/USDT")).toBeNull();
		expect(gateway.requests).toEqual([]);
		expect(await lifecycle.list("pending")).toEqual([]);
	});
});

describe("TradeExecutor.executeTrade", () => {
	it("retries a rejected limit order once at market and flags the fallback", async () => {
		const { gateway, executor, lifecycle } = setup();
		gateway.rejects = (request) => request.type === "limit";
		const created = await lifecycle.create(pendingTrade({ orderType: "limit" }));
		if (!created.ok) throw new Error("setup failed");

		const trade = await executor.executeTrade(created.trade);

		expect(gateway.requests.map((request) => [request.type, request.price])).toEqual([
			["limit", 100],
			["market", null],
		]);
		expect(trade).toMatchObject({ status: "active", fallbackExecuted: true, orderId: "o2" });
	});

	it("counts a failed market order against the retry ceiling without a fallback", async () => {
		const { gateway, executor, lifecycle } = setup(2);
		gateway.rejects = () => true;
		const created = await lifecycle.create(pendingTrade());
		if (!created.ok) throw new Error("setup failed");

		const first = await executor.executeTrade(created.trade);
		expect(first).toMatchObject({
			status: "pending",
			retryCount: 1,
			lastError: "venue rejected market",
		});
		expect(gateway.requests).toHaveLength(1);

		if (!first) throw new Error("trade missing");
		const second = await executor.executeTrade(first);
		expect(second).toMatchObject({
			status: "closed",
			closeReason: "exceeded_retries",
			retryCount: 2,
		});
	});

	it("leaves a resting order pending with its order attached", async () => {
		const { executor, lifecycle, budgets } = setup();
		const created = await lifecycle.create(pendingTrade({ orderType: "stop" }));
		if (!created.ok) throw new Error("setup failed");

		const trade = await executor.executeTrade(created.trade);

		expect(trade).toMatchObject({ status: "pending", orderId: "o1" });
		expect(await budgets.getBudget("s1")).toBe(0);
	});
});

describe("TradeExecutor.syncOrder", () => {
	const withOrder = async (status: ExchangeOrder["status"]) => {
		const context = setup();
		await context.budgets.setBudget("s1", 1000);
		await context.lifecycle.create(pendingTrade());
		context.gateway.orders.set("o9", {
			id: "o9",
			timestamp: 9_000,
			status,
			asset: "BTC/USDT",
			side: "buy",
			type: "limit",
			amount: 2,
			average: status === "closed" ? 101 : undefined,
		});
		const attached = await context.lifecycle.attachOrder("t1", { orderId: "o9" });
		if (!attached.ok) throw new Error("setup failed");
		return { ...context, trade: attached.trade };
	};

	it("activates the trade once the venue reports a fill", async () => {
		const { executor, trade, budgets } = await withOrder("closed");

		expect(await executor.syncOrder(trade)).toMatchObject({
			status: "active",
			entryPrice: 101,
			orderTimestamp: 9_000,
		});
		expect(await budgets.getBudget("s1")).toBe(800);
	});

	it("looks the order up on the trade's own market", async () => {
		const { executor, lifecycle, gateway } = setup();
		await lifecycle.create(pendingTrade({ tradeId: "t2", marketType: "futures" }));
		gateway.orders.set("o3", {
			id: "o3",
			timestamp: 3_000,
			status: "open",
			asset: "BTC/USDT",
			side: "buy",
			type: "limit",
			amount: 2,
		});
		const attached = await lifecycle.attachOrder("t2", { orderId: "o3" });
		if (!attached.ok) throw new Error("setup failed");

		await executor.syncOrder(attached.trade);

		expect(gateway.lookups).toEqual([
			{ orderId: "o3", asset: "BTC/USDT", marketType: "futures" },
		]);
	});

	it("keeps an open order pending", async () => {
		const { executor, trade } = await withOrder("open");
		expect(await executor.syncOrder(trade)).toMatchObject({ status: "pending", orderId: "o9" });
	});

	it("treats a canceled order as a failed attempt and clears the order", async () => {
		const { executor, trade } = await withOrder("canceled");
		const synced = await executor.syncOrder(trade);
		expect(synced).toMatchObject({
			status: "pending",
			retryCount: 1,
			lastError: "Order o9 ended as canceled",
		});
		expect(synced?.orderId).toBeUndefined();
	});
});

describe("TradeExecutor.closeTrade", () => {
	const activeTrade = async (side: "buy" | "sell") => {
		const context = setup();
		await context.lifecycle.create(pendingTrade({ side }));
		const activated = await context.lifecycle.activate("t1");
		if (!activated.ok) throw new Error("setup failed");
		return { ...context, trade: activated.trade };
	};

	it("closes a long at market and credits allocation plus pnl", async () => {
		const { executor, gateway, trade, budgets } = await activeTrade("buy");
		gateway.fillPrice = 110;

		const closed = await executor.closeTrade(trade);

		expect(gateway.requests[0]).toMatchObject({ type: "market", side: "sell", amount: 2 });
		expect(closed).toMatchObject({
			status: "closed",
			closeReason: "exit_signal",
			exitPrice: 110,
			realizedPnl: 20,
		});
		expect(await budgets.getBudget("s1")).toBe(220);
	});

	it("books short pnl when the price falls", async () => {
		const { executor, gateway, trade } = await activeTrade("sell");
		gateway.fillPrice = 90;

		const closed = await executor.closeTrade(trade);

		expect(gateway.requests[0]).toMatchObject({ side: "buy" });
		expect(closed?.realizedPnl).toBe(20);
	});

	it("refuses to close a trade that is not active", async () => {
		const { executor, lifecycle, gateway } = setup();
		const created = await lifecycle.create(pendingTrade());
		if (!created.ok) throw new Error("setup failed");

		expect(await executor.closeTrade(created.trade)).toBeNull();
		expect(gateway.requests).toEqual([]);
	});
});
