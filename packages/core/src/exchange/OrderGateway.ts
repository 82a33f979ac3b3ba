import type { MarketType, TradeSide } from "../types";

export type OrderStatus = "open" | "closed" | "canceled" | "expired" | "rejected";

export interface OrderRequest {
	asset: string;
	type: string;
	side: TradeSide;
	amount: number;
	price: number | null;
	marketType?: MarketType;
	params?: Record<string, unknown>;
}

/**
 * Order as returned by the venue. `id` and `timestamp` are stored on the
 * trade record verbatim.
 */
export interface ExchangeOrder {
	id: string;
	timestamp: number;
	status: OrderStatus;
	asset: string;
	side: TradeSide;
	type: string;
	amount: number;
	price?: number;
	average?: number;
	filled?: number;
}

export interface OrderGateway {
	createOrder(request: OrderRequest): Promise<ExchangeOrder>;
	/** `marketType` must match the one the order was placed on. */
	fetchOrder(orderId: string, asset: string, marketType?: MarketType): Promise<ExchangeOrder>;
}
