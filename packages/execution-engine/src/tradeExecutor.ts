import {
	createLogger,
	describeError,
	tradeIdFor,
	type CloseReason,
	type ExchangeOrder,
	type MarketDataClient,
	type ModuleLogger,
	type OrderGateway,
	type OrderRequest,
	type StrategyDefinition,
	type TradeRecord,
	type TradeSide,
} from "@tradeloop/core";
import { RiskManager } from "@tradeloop/risk-engine";
import type { TradeLifecycle, TransitionResult } from "@tradeloop/trade-lifecycle";

import type { BudgetManager } from "./budgetManager";

const FAILED_ORDER_STATUSES = new Set(["canceled", "rejected", "expired"]);

export interface TradeExecutorOptions {
	lifecycle: TradeLifecycle;
	gateway: OrderGateway;
	marketData: MarketDataClient;
	budgets: BudgetManager;
	risk?: RiskManager;
	now?: () => number;
	logger?: ModuleLogger;
}

/**
 * Turns signals and pending trades into venue orders and keeps the trade
 * record in step with what the venue reports.
 */
export class TradeExecutor {
	private readonly lifecycle: TradeLifecycle;
	private readonly gateway: OrderGateway;
	private readonly marketData: MarketDataClient;
	private readonly budgets: BudgetManager;
	private readonly risk: RiskManager;
	private readonly now: () => number;
	private readonly logger: ModuleLogger;

	constructor(options: TradeExecutorOptions) {
		this.lifecycle = options.lifecycle;
		this.gateway = options.gateway;
		this.marketData = options.marketData;
		this.budgets = options.budgets;
		this.risk = options.risk ?? new RiskManager();
		this.now = options.now ?? Date.now;
		this.logger = options.logger ?? createLogger("trade-executor");
	}

	/**
	 * Sizes a new position from the strategy budget and the current price,
	 * records it as pending and submits it. Returns null when the strategy
	 * has no budget left.
	 */
	async openPosition(
		strategy: StrategyDefinition,
		asset: string,
		side: TradeSide = strategy.tradeParameters.positionType === "short" ? "sell" : "buy"
	): Promise<TradeRecord | null> {
		const budget = await this.budgets.getBudget(strategy.id);
		if (budget <= 0) {
			this.logger.error("budget_unavailable", { strategyId: strategy.id, asset });
			return null;
		}

		const ticker = await this.marketData.fetchTicker(asset, strategy.marketType);
		const price = ticker.last;
		if (!Number.isFinite(price) || price <= 0) {
			this.logger.warn("open_position_unpriced", { strategyId: strategy.id, asset, price });
			return null;
		}
		const amount = Math.min(strategy.tradeParameters.positionSize, budget / price);
		const levels = this.risk.priceRisk(price, side, strategy.riskParameters);

		const created = await this.lifecycle.create({
			tradeId: tradeIdFor(strategy.id, asset, this.now()),
			strategyId: strategy.id,
			asset,
			side,
			amount,
			entryPrice: price,
			budgetAllocation: amount * price,
			stopLoss: levels.stopLoss,
			takeProfit: levels.takeProfit,
			trailingStop: levels.trailingStop,
			leverage: strategy.tradeParameters.leverage,
			orderType: strategy.tradeParameters.orderType,
			marketType: strategy.marketType,
			tradeType: side === "buy" ? "long" : "short",
		});
		if (!created.ok) {
			return null;
		}
		return this.executeTrade(created.trade);
	}

	/**
	 * Submits a pending trade. A rejected non-market order is retried once as
	 * a market order; a failure after that counts against the retry budget.
	 */
	async executeTrade(trade: TradeRecord): Promise<TradeRecord | null> {
		const orderType = trade.orderType ?? "market";
		const request: OrderRequest = {
			asset: trade.asset,
			type: orderType,
			side: trade.side,
			amount: trade.amount,
			price: orderType === "market" ? null : trade.entryPrice,
			marketType: trade.marketType,
		};

		let order: ExchangeOrder;
		try {
			order = await this.gateway.createOrder(request);
		} catch (error) {
			if (orderType === "market" || trade.fallbackExecuted) {
				return this.recordFailure(trade, error);
			}
			this.logger.warn("order_fallback_market", {
				tradeId: trade.tradeId,
				orderType,
				error: describeError(error),
			});
			await this.lifecycle.markFallbackExecuted(trade.tradeId);
			try {
				order = await this.gateway.createOrder({ ...request, type: "market", price: null });
			} catch (fallbackError) {
				return this.recordFailure(trade, fallbackError);
			}
		}

		this.logger.info("order_submitted", {
			tradeId: trade.tradeId,
			orderId: order.id,
			asset: trade.asset,
			side: trade.side,
			amount: trade.amount,
			status: order.status,
		});
		const attached = await this.lifecycle.attachOrder(trade.tradeId, {
			orderId: order.id,
			orderTimestamp: order.timestamp,
		});
		if (!attached.ok) {
			return null;
		}
		if (order.status === "closed") {
			return this.onFilled(attached.trade, order);
		}
		return attached.trade;
	}

	/** Polls the venue for a pending trade's order and applies the outcome. */
	async syncOrder(trade: TradeRecord): Promise<TradeRecord | null> {
		if (!trade.orderId) {
			return trade;
		}
		let order: ExchangeOrder;
		try {
			order = await this.gateway.fetchOrder(trade.orderId, trade.asset, trade.marketType);
		} catch (error) {
			this.logger.warn("order_sync_failed", {
				tradeId: trade.tradeId,
				orderId: trade.orderId,
				error: describeError(error),
			});
			return trade;
		}

		if (order.status === "closed") {
			return this.onFilled(trade, order);
		}
		if (FAILED_ORDER_STATUSES.has(order.status)) {
			return this.recordFailure(
				trade,
				new Error(`Order ${order.id} ended as ${order.status}`)
			);
		}
		return trade;
	}

	/**
	 * Unwinds an active trade at market, books the realised PnL and returns
	 * the allocation plus PnL to the strategy budget.
	 */
	async closeTrade(
		trade: TradeRecord,
		reason: CloseReason = "exit_signal"
	): Promise<TradeRecord | null> {
		if (trade.status !== "active") {
			this.logger.warn("close_skipped", { tradeId: trade.tradeId, status: trade.status });
			return null;
		}

		const order = await this.gateway.createOrder({
			asset: trade.asset,
			type: "market",
			side: this.risk.exitSide(trade.side),
			amount: trade.amount,
			price: null,
			marketType: trade.marketType,
		});
		const exitPrice =
			order.average ??
			order.price ??
			(await this.marketData.fetchTicker(trade.asset, trade.marketType)).last;
		const direction = trade.side === "buy" ? 1 : -1;
		const realizedPnl = (exitPrice - trade.entryPrice) * trade.amount * direction;

		const closed = await this.lifecycle.close(trade.tradeId, {
			reason,
			exitPrice,
			realizedPnl,
		});
		if (!closed.ok) {
			return null;
		}
		if (closed.changed) {
			await this.budgets.credit(trade.strategyId, trade.budgetAllocation + realizedPnl);
			this.logger.info("trade_closed", {
				tradeId: trade.tradeId,
				strategyId: trade.strategyId,
				exitPrice,
				realizedPnl,
				reason,
			});
		}
		return closed.trade;
	}

	private async onFilled(trade: TradeRecord, order: ExchangeOrder): Promise<TradeRecord | null> {
		const activated = await this.lifecycle.activate(trade.tradeId, {
			orderId: order.id,
			orderTimestamp: order.timestamp,
			entryPrice: order.average ?? order.price,
		});
		if (!activated.ok) {
			return null;
		}
		if (activated.changed) {
			await this.budgets.debit(trade.strategyId, trade.budgetAllocation);
			await this.placeRiskOrders(activated.trade);
		}
		return activated.trade;
	}

	/**
	 * Protective orders go out as separate calls. One failing leaves the
	 * others and the filled entry in place.
	 */
	private async placeRiskOrders(trade: TradeRecord): Promise<void> {
		const side = this.risk.exitSide(trade.side);
		const base = {
			asset: trade.asset,
			side,
			amount: trade.amount,
			marketType: trade.marketType,
		};
		const requests: Array<{ kind: string; request: OrderRequest }> = [];
		if (trade.stopLoss > 0) {
			requests.push({
				kind: "stop_loss",
				request: {
					...base,
					type: "stop",
					price: trade.stopLoss,
					params: { stopPrice: trade.stopLoss },
				},
			});
		}
		if (trade.takeProfit > 0) {
			requests.push({
				kind: "take_profit",
				request: { ...base, type: "limit", price: trade.takeProfit },
			});
		}
		if (trade.trailingStop > 0) {
			requests.push({
				kind: "trailing_stop",
				request: {
					...base,
					type: "trailingStop",
					price: null,
					params: { trailingPercent: trade.trailingStop },
				},
			});
		}

		for (const { kind, request } of requests) {
			try {
				const order = await this.gateway.createOrder(request);
				this.logger.info("risk_order_placed", {
					tradeId: trade.tradeId,
					kind,
					orderId: order.id,
					price: request.price,
				});
			} catch (error) {
				this.logger.error("risk_order_failed", {
					tradeId: trade.tradeId,
					kind,
					error: describeError(error),
				});
			}
		}
	}

	private async recordFailure(
		trade: TradeRecord,
		error: unknown
	): Promise<TradeRecord | null> {
		this.logger.error("order_failed", {
			tradeId: trade.tradeId,
			asset: trade.asset,
			error: describeError(error),
		});
		const result: TransitionResult = await this.lifecycle.recordFailure(trade.tradeId, error);
		return result.ok ? result.trade : null;
	}
}
