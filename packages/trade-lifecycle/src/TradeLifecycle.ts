import {
	TRADE_STATUSES,
	createLogger,
	describeError,
	type CloseReason,
	type MarketType,
	type ModuleLogger,
	type PositionType,
	type TradeRecord,
	type TradeSide,
	type TradeStatus,
	type TradeTerms,
} from "@tradeloop/core";
import type { KeyValueStore, StoreOp } from "@tradeloop/persistence";

import { KeyedLock } from "./KeyedLock";
import { statusSetKey, strategyTradesKey, tradeKey } from "./keys";
import { decodeTrade, encodeTrade } from "./tradeCodec";

export const DEFAULT_MAX_RETRIES = 3;

export type TransitionFailureReason =
	| "trade_not_found"
	| "invalid_transition"
	| "duplicate_trade";

export type TransitionResult =
	| { ok: true; trade: TradeRecord; changed: boolean }
	| {
			ok: false;
			reason: TransitionFailureReason;
			tradeId: string;
			status?: TradeStatus;
	  };

export interface CreateTradeInput {
	tradeId: string;
	strategyId: string;
	asset: string;
	side: TradeSide;
	amount: number;
	entryPrice: number;
	budgetAllocation: number;
	stopLoss?: number;
	takeProfit?: number;
	trailingStop?: number;
	leverage?: number;
	orderType?: string;
	marketType?: MarketType;
	tradeType?: PositionType;
}

export interface OrderFill {
	orderId?: string;
	orderTimestamp?: number;
	entryPrice?: number;
}

export interface OrderReference {
	orderId: string;
	orderTimestamp?: number;
}

export interface CloseDetails {
	reason: CloseReason;
	exitPrice?: number;
	realizedPnl?: number;
}

export interface TradeLifecycleOptions {
	maxRetries?: number;
	now?: () => number;
	logger?: ModuleLogger;
}

type Mutation =
	| { kind: "write"; trade: TradeRecord }
	| { kind: "noop"; trade: TradeRecord }
	| { kind: "reject"; status: TradeStatus };

/**
 * Pending -> active -> closed state machine over the key-value store.
 *
 * The record's `status` field is the state; the `trades:<status>` sets are
 * indexes rewritten in the same commit as the record. Operations on one trade
 * id are serialized, operations on different ids are not.
 */
export class TradeLifecycle {
	private readonly lock = new KeyedLock();
	private readonly maxRetries: number;
	private readonly now: () => number;
	private readonly logger: ModuleLogger;

	constructor(
		private readonly store: KeyValueStore,
		options: TradeLifecycleOptions = {}
	) {
		this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
		this.now = options.now ?? Date.now;
		this.logger = options.logger ?? createLogger("trade-lifecycle");
	}

	async create(input: CreateTradeInput): Promise<TransitionResult> {
		return this.lock.run<TransitionResult>(input.tradeId, async () => {
			const existing = await this.store.hgetall(tradeKey(input.tradeId));
			if (existing) {
				this.logger.warn("trade_duplicate", { tradeId: input.tradeId });
				return { ok: false, reason: "duplicate_trade", tradeId: input.tradeId };
			}

			const timestamp = this.now();
			const trade: TradeRecord = {
				...input,
				stopLoss: input.stopLoss ?? 0,
				takeProfit: input.takeProfit ?? 0,
				trailingStop: input.trailingStop ?? 0,
				status: "pending",
				retryCount: 0,
				fallbackExecuted: false,
				createdAt: timestamp,
				updatedAt: timestamp,
			};
			await this.store.commit([
				...this.recordOps(trade),
				{
					op: "sadd",
					key: strategyTradesKey(trade.strategyId),
					member: trade.tradeId,
				},
			]);
			this.logger.info("trade_created", {
				tradeId: trade.tradeId,
				strategyId: trade.strategyId,
				asset: trade.asset,
				side: trade.side,
				amount: trade.amount,
			});
			return { ok: true, trade, changed: true };
		});
	}

	/** pending -> active. A trade that is already active is left as is. */
	async activate(tradeId: string, fill: OrderFill = {}): Promise<TransitionResult> {
		return this.transition(tradeId, "activate", (trade) => {
			if (trade.status === "active") {
				return { kind: "noop", trade };
			}
			if (trade.status !== "pending") {
				return { kind: "reject", status: trade.status };
			}
			return {
				kind: "write",
				trade: {
					...trade,
					status: "active",
					orderId: fill.orderId ?? trade.orderId,
					orderTimestamp: fill.orderTimestamp ?? trade.orderTimestamp,
					entryPrice: fill.entryPrice ?? trade.entryPrice,
				},
			};
		});
	}

	/** active -> closed. A trade that is already closed is left as is. */
	async close(tradeId: string, details: CloseDetails): Promise<TransitionResult> {
		return this.transition(tradeId, "close", (trade) => {
			if (trade.status === "closed") {
				return { kind: "noop", trade };
			}
			if (trade.status !== "active") {
				return { kind: "reject", status: trade.status };
			}
			return {
				kind: "write",
				trade: {
					...trade,
					status: "closed",
					closeReason: details.reason,
					exitPrice: details.exitPrice ?? trade.exitPrice,
					realizedPnl: details.realizedPnl ?? trade.realizedPnl,
				},
			};
		});
	}

	/**
	 * Counts a failed execution attempt on a pending trade. Below the retry
	 * ceiling the trade stays pending with its order reference cleared; at the
	 * ceiling it is closed as `exceeded_retries`.
	 */
	async recordFailure(tradeId: string, error: unknown): Promise<TransitionResult> {
		return this.transition(tradeId, "record_failure", (trade) => {
			if (trade.status !== "pending") {
				return { kind: "reject", status: trade.status };
			}
			const retryCount = trade.retryCount + 1;
			const exhausted = retryCount >= this.maxRetries;
			const next: TradeRecord = {
				...trade,
				retryCount,
				lastError: describeError(error),
				orderId: undefined,
				orderTimestamp: undefined,
			};
			if (exhausted) {
				next.status = "closed";
				next.closeReason = "exceeded_retries";
				this.logger.warn("trade_retries_exceeded", {
					tradeId,
					strategyId: trade.strategyId,
					retryCount,
					maxRetries: this.maxRetries,
					error: next.lastError,
				});
			} else {
				this.logger.info("trade_retry_scheduled", {
					tradeId,
					retryCount,
					maxRetries: this.maxRetries,
					error: next.lastError,
				});
			}
			return { kind: "write", trade: next };
		});
	}

	/** pending|active -> closed without a fill, e.g. dropped by reconciliation. */
	async archive(
		tradeId: string,
		reason: CloseReason = "reconciled_out"
	): Promise<TransitionResult> {
		return this.transition(tradeId, "archive", (trade) => {
			if (trade.status === "closed") {
				return { kind: "noop", trade };
			}
			return {
				kind: "write",
				trade: { ...trade, status: "closed", closeReason: reason },
			};
		});
	}

	/**
	 * Overwrites economic terms of an open trade. Status, retry count and the
	 * fallback flag are never touched.
	 */
	async update(
		tradeId: string,
		fields: Partial<TradeTerms>
	): Promise<TransitionResult> {
		return this.transition(tradeId, "update", (trade) => {
			if (trade.status === "closed") {
				return { kind: "reject", status: trade.status };
			}
			const next: TradeRecord = { ...trade };
			for (const [key, value] of Object.entries(fields)) {
				if (value !== undefined) {
					Object.assign(next, { [key]: value });
				}
			}
			next.status = trade.status;
			next.retryCount = trade.retryCount;
			next.fallbackExecuted = trade.fallbackExecuted;
			return { kind: "write", trade: next };
		});
	}

	async attachOrder(
		tradeId: string,
		order: OrderReference
	): Promise<TransitionResult> {
		return this.transition(tradeId, "attach_order", (trade) => {
			if (trade.status !== "pending") {
				return { kind: "reject", status: trade.status };
			}
			return {
				kind: "write",
				trade: {
					...trade,
					orderId: order.orderId,
					orderTimestamp: order.orderTimestamp ?? trade.orderTimestamp,
				},
			};
		});
	}

	async markFallbackExecuted(tradeId: string): Promise<TransitionResult> {
		return this.transition(tradeId, "mark_fallback", (trade) => {
			if (trade.status !== "pending") {
				return { kind: "reject", status: trade.status };
			}
			if (trade.fallbackExecuted) {
				return { kind: "noop", trade };
			}
			return { kind: "write", trade: { ...trade, fallbackExecuted: true } };
		});
	}

	async get(tradeId: string): Promise<TradeRecord | null> {
		const hash = await this.store.hgetall(tradeKey(tradeId));
		return hash ? decodeTrade(hash) : null;
	}

	async list(status: TradeStatus): Promise<TradeRecord[]> {
		return this.loadAll(await this.store.smembers(statusSetKey(status)));
	}

	async listByStrategy(
		strategyId: string,
		statuses: readonly TradeStatus[] = TRADE_STATUSES
	): Promise<TradeRecord[]> {
		const trades = await this.loadAll(
			await this.store.smembers(strategyTradesKey(strategyId))
		);
		return trades.filter((trade) => statuses.includes(trade.status));
	}

	async listOpenByStrategy(strategyId: string): Promise<TradeRecord[]> {
		return this.listByStrategy(strategyId, ["pending", "active"]);
	}

	private async loadAll(ids: string[]): Promise<TradeRecord[]> {
		const trades: TradeRecord[] = [];
		for (const id of ids) {
			const trade = await this.get(id);
			if (trade) {
				trades.push(trade);
			}
		}
		return trades;
	}

	private async transition(
		tradeId: string,
		action: string,
		apply: (trade: TradeRecord) => Mutation
	): Promise<TransitionResult> {
		return this.lock.run<TransitionResult>(tradeId, async () => {
			const current = await this.get(tradeId);
			if (!current) {
				this.logger.warn("trade_not_found", { tradeId, action });
				return { ok: false, reason: "trade_not_found", tradeId };
			}

			const mutation = apply(current);
			if (mutation.kind === "reject") {
				this.logger.warn("trade_transition_rejected", {
					tradeId,
					action,
					status: mutation.status,
				});
				return {
					ok: false,
					reason: "invalid_transition",
					tradeId,
					status: mutation.status,
				};
			}
			if (mutation.kind === "noop") {
				return { ok: true, trade: mutation.trade, changed: false };
			}

			const next: TradeRecord = { ...mutation.trade, updatedAt: this.now() };
			const ops = this.recordOps(next);
			if (next.strategyId !== current.strategyId) {
				ops.push(
					{
						op: "srem",
						key: strategyTradesKey(current.strategyId),
						member: tradeId,
					},
					{ op: "sadd", key: strategyTradesKey(next.strategyId), member: tradeId }
				);
			}
			await this.store.commit(ops);
			if (next.status !== current.status) {
				this.logger.info("trade_transitioned", {
					tradeId,
					action,
					from: current.status,
					to: next.status,
				});
			}
			return { ok: true, trade: next, changed: true };
		});
	}

	/** Record rewrite plus membership in exactly one status set. */
	private recordOps(trade: TradeRecord): StoreOp[] {
		const ops: StoreOp[] = [
			{ op: "del", key: tradeKey(trade.tradeId) },
			{ op: "hset", key: tradeKey(trade.tradeId), fields: encodeTrade(trade) },
		];
		for (const status of TRADE_STATUSES) {
			ops.push(
				status === trade.status
					? { op: "sadd", key: statusSetKey(status), member: trade.tradeId }
					: { op: "srem", key: statusSetKey(status), member: trade.tradeId }
			);
		}
		return ops;
	}
}
