import { MARKET_TYPES, type MarketType, type PositionType, type TradeSide } from "@tradeloop/core";

import type { CandidateTrade } from "./types";

export type NormalizeResult =
	| { ok: true; trade: CandidateTrade }
	| { ok: false; issues: string[] };

type RawRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is RawRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const snake = (key: string): string =>
	key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);

/** First defined value among the camelCase keys and their snake_case forms. */
const read = (source: RawRecord, ...keys: string[]): unknown => {
	for (const key of keys) {
		if (source[key] !== undefined && source[key] !== null) {
			return source[key];
		}
		const snakeKey = snake(key);
		if (source[snakeKey] !== undefined && source[snakeKey] !== null) {
			return source[snakeKey];
		}
	}
	return undefined;
};

const toNumber = (value: unknown): number | undefined => {
	if (typeof value === "number" && Number.isFinite(value)) {
		return value;
	}
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
};

const toText = (value: unknown): string | undefined => {
	if (typeof value === "string" && value.trim() !== "") {
		return value.trim();
	}
	if (typeof value === "number" && Number.isFinite(value)) {
		return String(value);
	}
	return undefined;
};

/**
 * Coerces one suggested trade into the trade term set. Missing risk fields
 * default to 0 and `strategyId` is always the reconciled strategy.
 */
export const normalizeCandidateTrade = (
	raw: unknown,
	strategyId: string
): NormalizeResult => {
	if (!isRecord(raw)) {
		return { ok: false, issues: ["candidate must be an object"] };
	}
	const issues: string[] = [];

	const tradeId = toText(read(raw, "tradeId", "id"));
	if (!tradeId) issues.push("tradeId is required");
	const asset = toText(read(raw, "asset", "symbol"));
	if (!asset) issues.push("asset is required");

	const sideRaw = toText(read(raw, "side"))?.toLowerCase();
	const side: TradeSide | undefined =
		sideRaw === "buy" || sideRaw === "sell" ? sideRaw : undefined;
	if (!side) issues.push(`side ${JSON.stringify(sideRaw)} must be buy or sell`);

	const amount = toNumber(read(raw, "amount"));
	if (amount === undefined || amount < 0) issues.push("amount must be a non-negative number");
	const entryPrice = toNumber(read(raw, "entryPrice", "price"));
	if (entryPrice === undefined || entryPrice < 0) {
		issues.push("entryPrice must be a non-negative number");
	}
	const budgetAllocation = toNumber(read(raw, "budgetAllocation"));
	if (budgetAllocation === undefined || budgetAllocation < 0) {
		issues.push("budgetAllocation must be a non-negative number");
	}

	const marketTypeRaw = toText(read(raw, "marketType"))?.toLowerCase();
	const marketType: MarketType | undefined = MARKET_TYPES.find(
		(type) => type === marketTypeRaw
	);
	if (marketTypeRaw !== undefined && !marketType) {
		issues.push(`marketType "${marketTypeRaw}" is not supported`);
	}
	const tradeTypeRaw = toText(read(raw, "tradeType"))?.toLowerCase();
	const tradeType: PositionType | undefined =
		tradeTypeRaw === "long" || tradeTypeRaw === "short" ? tradeTypeRaw : undefined;
	if (tradeTypeRaw !== undefined && !tradeType) {
		issues.push(`tradeType "${tradeTypeRaw}" must be long or short`);
	}

	if (
		issues.length ||
		!tradeId ||
		!asset ||
		!side ||
		amount === undefined ||
		entryPrice === undefined ||
		budgetAllocation === undefined
	) {
		return { ok: false, issues };
	}

	const trade: CandidateTrade = {
		tradeId,
		strategyId,
		asset,
		side,
		amount,
		entryPrice,
		budgetAllocation,
		stopLoss: toNumber(read(raw, "stopLoss")) ?? 0,
		takeProfit: toNumber(read(raw, "takeProfit")) ?? 0,
		trailingStop: toNumber(read(raw, "trailingStop", "trailingStopLoss")) ?? 0,
	};
	const leverage = toNumber(read(raw, "leverage"));
	if (leverage !== undefined) trade.leverage = leverage;
	const orderType = toText(read(raw, "orderType"))?.toLowerCase();
	if (orderType !== undefined) trade.orderType = orderType;
	if (marketType) trade.marketType = marketType;
	if (tradeType) trade.tradeType = tradeType;
	return { ok: true, trade };
};
