import type { TradeRecord } from "@tradeloop/core";

import type { DrawdownStats, StrategyPerformance } from "./metricsSchema";

export interface CalcPerformanceOptions {
	/** Equity the curve starts from. Defaults to the capital the trades committed. */
	startingEquity?: number;
}

export const calcStrategyPerformance = (
	strategyId: string,
	closedTrades: TradeRecord[],
	options: CalcPerformanceOptions = {}
): StrategyPerformance => {
	// Archived and abandoned trades never filled, so they carry no PnL.
	const settled = closedTrades
		.filter(
			(trade) =>
				trade.status === "closed" &&
				trade.realizedPnl !== undefined &&
				Number.isFinite(trade.realizedPnl)
		)
		.sort((a, b) => a.updatedAt - b.updatedAt);

	const pnls = settled.map((trade) => trade.realizedPnl ?? 0);
	const totalPnl = pnls.reduce((sum, pnl) => sum + pnl, 0);
	const capital = settled.reduce((sum, trade) => sum + trade.budgetAllocation, 0);
	const wins = pnls.filter((pnl) => pnl > 0).length;
	const losses = pnls.filter((pnl) => pnl < 0).length;
	const count = settled.length;

	const { maxDrawdownPct } = analyzeDrawdown(pnls, options.startingEquity ?? capital);

	return {
		strategyId,
		trades: count,
		wins,
		losses,
		totalPnl,
		roi: capital > 0 ? (totalPnl / capital) * 100 : 0,
		winRate: count ? (wins / count) * 100 : 0,
		avgProfit: count ? totalPnl / count : 0,
		maxDrawdown: maxDrawdownPct * 100,
	};
};

export const analyzeDrawdown = (pnls: number[], startingEquity: number): DrawdownStats => {
	let equity = startingEquity;
	let peakEquity = startingEquity;
	let maxDrawdown = 0;
	let maxDrawdownPct = 0;

	for (const pnl of pnls) {
		equity += pnl;
		if (equity > peakEquity) {
			peakEquity = equity;
			continue;
		}
		const depth = peakEquity - equity;
		if (depth > maxDrawdown) {
			maxDrawdown = depth;
			maxDrawdownPct = peakEquity > 0 ? depth / peakEquity : 0;
		}
	}

	return { maxDrawdown, maxDrawdownPct, peakEquity, finalEquity: equity };
};
