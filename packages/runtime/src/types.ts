import type { CloseReason, StrategyDefinition, TradeRecord, TradeSide } from "@tradeloop/core";

/** Where the loops read the strategies to work on each pass. */
export interface ActiveStrategySource {
	getActiveStrategies(): Promise<StrategyDefinition[]>;
}

/** The execution collaborator as the monitoring loop drives it. */
export interface SignalExecutor {
	openPosition(
		strategy: StrategyDefinition,
		asset: string,
		side?: TradeSide
	): Promise<TradeRecord | null>;
	executeTrade(trade: TradeRecord): Promise<TradeRecord | null>;
	syncOrder(trade: TradeRecord): Promise<TradeRecord | null>;
	closeTrade(trade: TradeRecord, reason?: CloseReason): Promise<TradeRecord | null>;
}

export interface PassSummary {
	pass: number;
	strategies: number;
	assets: number;
	entrySignals: number;
	exitSignals: number;
	failures: number;
	durationMs: number;
}
