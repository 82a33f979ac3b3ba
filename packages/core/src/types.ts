export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export interface Ticker {
	symbol: string;
	last: number;
	high: number | null;
	low: number | null;
	baseVolume: number | null;
	timestamp?: number;
}

export type MarketType = "spot" | "futures" | "margin";
export const MARKET_TYPES: readonly MarketType[] = ["spot", "futures", "margin"];

export type TradeSide = "buy" | "sell";
export type PositionType = "long" | "short";

export type ComparisonOperator = ">" | "<" | "==" | ">=" | "<=";
export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = [
	">",
	"<",
	"==",
	">=",
	"<=",
];

export type IndicatorParameters = Record<string, number | string | boolean>;

export interface IndicatorReference {
	indicator: string;
	indicatorParameters?: IndicatorParameters;
}

/**
 * A single comparison between an indicator's latest value and either a scalar
 * threshold or another indicator's latest value. A string `value` that does
 * not parse as a number names an indicator without parameters.
 */
export interface Condition {
	indicator: string;
	indicatorParameters?: IndicatorParameters;
	operator: string;
	value: number | string | IndicatorReference;
	timeframe?: string;
}

export interface TradeParameters {
	leverage: number;
	orderType: string;
	positionSize: number;
	positionType?: PositionType;
}

export interface RiskParameters {
	stopLossPct: number;
	takeProfitPct: number;
	trailingStopPct: number;
}

export interface StrategyDefinition {
	id: string;
	title: string;
	assets: string[];
	marketType: MarketType;
	entryConditions: Condition[];
	exitConditions: Condition[];
	tradeParameters: TradeParameters;
	riskParameters: RiskParameters;
}

export type TradeStatus = "pending" | "active" | "closed";
export const TRADE_STATUSES: readonly TradeStatus[] = [
	"pending",
	"active",
	"closed",
];

export type CloseReason =
	| "exit_signal"
	| "closed"
	| "exceeded_retries"
	| "reconciled_out";

export interface TradeRecord {
	tradeId: string;
	strategyId: string;
	asset: string;
	side: TradeSide;
	amount: number;
	entryPrice: number;
	status: TradeStatus;
	retryCount: number;
	fallbackExecuted: boolean;
	budgetAllocation: number;
	stopLoss: number;
	takeProfit: number;
	trailingStop: number;
	leverage?: number;
	orderType?: string;
	marketType?: MarketType;
	tradeType?: PositionType;
	orderId?: string;
	orderTimestamp?: number;
	exitPrice?: number;
	realizedPnl?: number;
	closeReason?: CloseReason;
	lastError?: string;
	createdAt: number;
	updatedAt: number;
}

/**
 * Trade ids are `<strategyId>:<asset>:<openedAt>`. Signal-driven entries and
 * suggested trades mint them the same way, so both refer to one position.
 */
export const tradeIdFor = (strategyId: string, asset: string, openedAt: number): string =>
	`${strategyId}:${asset}:${openedAt}`;

/**
 * Fields a trade carries as economic terms. Reconciliation compares and
 * overwrites only these; lifecycle bookkeeping stays with the state machine.
 */
export const TRADE_TERM_FIELDS = [
	"strategyId",
	"asset",
	"side",
	"amount",
	"entryPrice",
	"budgetAllocation",
	"stopLoss",
	"takeProfit",
	"trailingStop",
	"leverage",
	"orderType",
	"marketType",
	"tradeType",
] as const;

export type TradeTermField = (typeof TRADE_TERM_FIELDS)[number];
export type TradeTerms = Pick<TradeRecord, TradeTermField>;
