export type { MarketDataClient } from "./MarketDataClient";
export type {
	ExchangeOrder,
	OrderGateway,
	OrderRequest,
	OrderStatus,
} from "./OrderGateway";
