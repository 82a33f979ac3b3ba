import {
	MARKET_TYPES,
	TRADE_STATUSES,
	type CloseReason,
	type MarketType,
	type PositionType,
	type TradeRecord,
	type TradeSide,
	type TradeStatus,
} from "@tradeloop/core";

const CLOSE_REASONS: readonly CloseReason[] = [
	"exit_signal",
	"closed",
	"exceeded_retries",
	"reconciled_out",
];

export class TradeRecordDecodeError extends Error {
	constructor(readonly tradeId: string, readonly field: string) {
		super(`Stored trade "${tradeId}" has an invalid "${field}" field`);
		this.name = "TradeRecordDecodeError";
	}
}

/** Flattens a trade into the string hash the store keeps. */
export const encodeTrade = (trade: TradeRecord): Record<string, string> => {
	const fields: Record<string, string> = {};
	for (const [key, value] of Object.entries(trade)) {
		if (value === undefined || value === null) {
			continue;
		}
		fields[key] = String(value);
	}
	return fields;
};

const oneOf = <T extends string>(
	allowed: readonly T[],
	value: string | undefined
): T | undefined => allowed.find((entry) => entry === value);

export const decodeTrade = (hash: Record<string, string>): TradeRecord => {
	const tradeId = hash.tradeId;
	if (!tradeId) {
		throw new TradeRecordDecodeError("<unknown>", "tradeId");
	}

	const text = (field: string): string => {
		const value = hash[field];
		if (value === undefined || value === "") {
			throw new TradeRecordDecodeError(tradeId, field);
		}
		return value;
	};
	const num = (field: string): number => {
		const value = Number(text(field));
		if (!Number.isFinite(value)) {
			throw new TradeRecordDecodeError(tradeId, field);
		}
		return value;
	};
	const optionalNum = (field: string): number | undefined =>
		hash[field] === undefined ? undefined : num(field);
	const optionalText = (field: string): string | undefined =>
		hash[field] === undefined ? undefined : hash[field];
	const required = <T extends string>(
		allowed: readonly T[],
		field: string
	): T => {
		const value = oneOf(allowed, hash[field]);
		if (value === undefined) {
			throw new TradeRecordDecodeError(tradeId, field);
		}
		return value;
	};
	const optional = <T extends string>(
		allowed: readonly T[],
		field: string
	): T | undefined =>
		hash[field] === undefined ? undefined : required(allowed, field);

	const trade: TradeRecord = {
		tradeId,
		strategyId: text("strategyId"),
		asset: text("asset"),
		side: required<TradeSide>(["buy", "sell"], "side"),
		amount: num("amount"),
		entryPrice: num("entryPrice"),
		status: required<TradeStatus>(TRADE_STATUSES, "status"),
		retryCount: num("retryCount"),
		fallbackExecuted: hash.fallbackExecuted === "true",
		budgetAllocation: num("budgetAllocation"),
		stopLoss: num("stopLoss"),
		takeProfit: num("takeProfit"),
		trailingStop: num("trailingStop"),
		createdAt: num("createdAt"),
		updatedAt: num("updatedAt"),
	};

	const leverage = optionalNum("leverage");
	if (leverage !== undefined) trade.leverage = leverage;
	const orderType = optionalText("orderType");
	if (orderType !== undefined) trade.orderType = orderType;
	const marketType = optional<MarketType>(MARKET_TYPES, "marketType");
	if (marketType !== undefined) trade.marketType = marketType;
	const tradeType = optional<PositionType>(["long", "short"], "tradeType");
	if (tradeType !== undefined) trade.tradeType = tradeType;
	const orderId = optionalText("orderId");
	if (orderId !== undefined) trade.orderId = orderId;
	const orderTimestamp = optionalNum("orderTimestamp");
	if (orderTimestamp !== undefined) trade.orderTimestamp = orderTimestamp;
	const exitPrice = optionalNum("exitPrice");
	if (exitPrice !== undefined) trade.exitPrice = exitPrice;
	const realizedPnl = optionalNum("realizedPnl");
	if (realizedPnl !== undefined) trade.realizedPnl = realizedPnl;
	const closeReason = optional<CloseReason>(CLOSE_REASONS, "closeReason");
	if (closeReason !== undefined) trade.closeReason = closeReason;
	const lastError = optionalText("lastError");
	if (lastError !== undefined) trade.lastError = lastError;

	return trade;
};
