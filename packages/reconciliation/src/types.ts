import type {
	CloseReason,
	StrategyDefinition,
	Ticker,
	TradeRecord,
	TradeTerms,
} from "@tradeloop/core";

/** Latest ticker per asset, keyed by symbol. */
export type MarketDataSnapshot = Record<string, Ticker>;

export interface CandidateTrade extends TradeTerms {
	tradeId: string;
}

/**
 * Produces the trades a strategy should hold right now. Entries are raw
 * records in the trade field set, snake_case or camelCase; they are
 * normalised before use. A suggestion that keeps an open position must reuse
 * that trade's id from `openTrades`.
 */
export interface SuggestionService {
	generateTrades(
		strategy: StrategyDefinition,
		marketData: MarketDataSnapshot,
		budget: number,
		openTrades: readonly TradeRecord[]
	): Promise<unknown[]>;
}

/** Unwinds a filled position that reconciliation drops. */
export interface PositionCloser {
	closeTrade(trade: TradeRecord, reason: CloseReason): Promise<TradeRecord | null>;
}

export interface TradeUpdateNotifier {
	onTradesUpdated(strategyId: string, trades: TradeRecord[]): Promise<void> | void;
}

export interface ReconciliationResult {
	strategyId: string;
	additions: TradeRecord[];
	updates: TradeRecord[];
	removals: TradeRecord[];
	unchanged: string[];
	skipped: number;
}
