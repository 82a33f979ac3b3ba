import type { TradeStatus } from "@tradeloop/core";

export const tradeKey = (tradeId: string): string => `trade:${tradeId}`;
export const statusSetKey = (status: TradeStatus): string => `trades:${status}`;
export const strategyTradesKey = (strategyId: string): string =>
	`strategy:${strategyId}:trades`;
