import type { OHLCV } from "ccxt";
import type {
	Candle,
	ExchangeOrder,
	MarketType,
	OrderRequest,
	OrderStatus,
	Ticker,
} from "@tradeloop/core";

/** Fields of a ccxt ticker the monitor reads. */
export interface CcxtTickerLike {
	symbol: string;
	last?: number;
	high?: number;
	low?: number;
	baseVolume?: number;
	timestamp?: number;
}

/** Fields of a ccxt order the monitor reads. */
export interface CcxtOrderLike {
	id: string;
	timestamp?: number;
	status?: string;
	symbol?: string;
	side?: string;
	type?: string;
	amount?: number;
	price?: number;
	average?: number;
	filled?: number;
}

export const mapCcxtCandleToCandle = (
	row: OHLCV,
	symbol: string,
	timeframe: string
): Candle => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		symbol,
		timeframe,
		timestamp: Number(timestamp ?? 0),
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
	};
};

const finiteOrNull = (value: number | undefined): number | null =>
	value !== undefined && Number.isFinite(value) ? value : null;

export const mapCcxtTicker = (raw: CcxtTickerLike, asset: string): Ticker => {
	const last = Number(raw.last ?? NaN);
	if (!Number.isFinite(last)) {
		throw new Error(`Ticker for ${asset} has no last price`);
	}
	return {
		symbol: asset,
		last,
		high: finiteOrNull(raw.high),
		low: finiteOrNull(raw.low),
		baseVolume: finiteOrNull(raw.baseVolume),
		timestamp: raw.timestamp,
	};
};

const ORDER_STATUSES: Record<string, OrderStatus> = {
	open: "open",
	closed: "closed",
	canceled: "canceled",
	cancelled: "canceled",
	expired: "expired",
	rejected: "rejected",
};

/**
 * Venue order -> ExchangeOrder. Fields the venue leaves out fall back to the
 * request that produced the order; an unknown status reads as open.
 */
export const mapCcxtOrder = (
	raw: CcxtOrderLike,
	asset: string,
	request?: Pick<OrderRequest, "side" | "type" | "amount" | "price">
): ExchangeOrder => {
	const side = raw.side === "buy" || raw.side === "sell" ? raw.side : request?.side;
	if (!side) {
		throw new Error(`Order ${raw.id} for ${asset} has no side`);
	}
	const order: ExchangeOrder = {
		id: raw.id,
		timestamp: raw.timestamp ?? Date.now(),
		status: ORDER_STATUSES[raw.status?.toLowerCase() ?? "open"] ?? "open",
		asset,
		side,
		type: raw.type ?? request?.type ?? "market",
		amount: raw.amount ?? request?.amount ?? 0,
	};
	const price = raw.price ?? request?.price ?? undefined;
	if (price !== undefined) order.price = price;
	if (raw.average !== undefined) order.average = raw.average;
	if (raw.filled !== undefined) order.filled = raw.filled;
	return order;
};

/** ccxt names perpetual futures "swap". */
export const toCcxtMarketType = (marketType: MarketType): string =>
	marketType === "futures" ? "swap" : marketType;
