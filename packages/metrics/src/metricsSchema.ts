export interface StrategyPerformance {
	strategyId: string;
	/** Closed trades with a realised PnL. */
	trades: number;
	wins: number;
	losses: number;
	totalPnl: number;
	/** Percent of the capital the counted trades committed. */
	roi: number;
	/** Percent. */
	winRate: number;
	avgProfit: number;
	/** Deepest peak-to-trough fall of the equity curve, percent. */
	maxDrawdown: number;
}

export interface DrawdownStats {
	maxDrawdown: number;
	maxDrawdownPct: number;
	peakEquity: number;
	finalEquity: number;
}
