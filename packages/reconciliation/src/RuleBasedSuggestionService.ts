import {
	createLogger,
	tradeIdFor,
	type StrategyDefinition,
	type TradeRecord,
	type TradeSide,
} from "@tradeloop/core";
import { RiskManager } from "@tradeloop/risk-engine";

import type { CandidateTrade, MarketDataSnapshot, SuggestionService } from "./types";

const logger = createLogger("rule-based-suggestions");

export interface RuleBasedSuggestionServiceOptions {
	risk?: RiskManager;
	now?: () => number;
}

/**
 * Derives one candidate per asset straight from the strategy definition.
 *
 * `positionSize` (capped at 1) is the share of the budget committed. Assets
 * already held by an active trade keep that trade's id, size and allocation;
 * only their risk levels are re-priced. The rest of the committed share is
 * split evenly across the remaining priced assets, reusing the id of a
 * pending trade where one exists.
 */
export class RuleBasedSuggestionService implements SuggestionService {
	private readonly risk: RiskManager;
	private readonly now: () => number;

	constructor(options: RuleBasedSuggestionServiceOptions = {}) {
		this.risk = options.risk ?? new RiskManager();
		this.now = options.now ?? Date.now;
	}

	async generateTrades(
		strategy: StrategyDefinition,
		marketData: MarketDataSnapshot,
		budget: number,
		openTrades: readonly TradeRecord[] = []
	): Promise<CandidateTrade[]> {
		if (budget <= 0) {
			return [];
		}
		const openByAsset = new Map<string, TradeRecord>();
		for (const trade of openTrades) {
			if (trade.strategyId === strategy.id && !openByAsset.has(trade.asset)) {
				openByAsset.set(trade.asset, trade);
			}
		}

		const held: CandidateTrade[] = [];
		const slots: Array<{ asset: string; price: number; tradeId?: string }> = [];
		for (const asset of strategy.assets) {
			const open = openByAsset.get(asset);
			if (open?.status === "active") {
				held.push(this.holdCandidate(strategy, open));
				continue;
			}
			const last = marketData[asset]?.last;
			if (last === undefined || !Number.isFinite(last) || last <= 0) {
				logger.warn("suggestion_price_missing", { strategyId: strategy.id, asset });
				if (open) {
					held.push(this.holdCandidate(strategy, open));
				}
				continue;
			}
			slots.push({ asset, price: last, tradeId: open?.tradeId });
		}

		const share = Math.min(Math.max(strategy.tradeParameters.positionSize, 0), 1);
		const reserved = held.reduce((sum, trade) => sum + trade.budgetAllocation, 0);
		const pool = share * budget - reserved;
		if (!slots.length || pool <= 0) {
			return held;
		}

		const allocation = pool / slots.length;
		const side: TradeSide =
			strategy.tradeParameters.positionType === "short" ? "sell" : "buy";
		const openedAt = this.now();
		const fresh = slots.map(({ asset, price, tradeId }): CandidateTrade => {
			const levels = this.risk.priceRisk(price, side, strategy.riskParameters);
			return {
				tradeId: tradeId ?? tradeIdFor(strategy.id, asset, openedAt),
				strategyId: strategy.id,
				asset,
				side,
				amount: allocation / price,
				entryPrice: price,
				budgetAllocation: allocation,
				stopLoss: levels.stopLoss,
				takeProfit: levels.takeProfit,
				trailingStop: levels.trailingStop,
				leverage: strategy.tradeParameters.leverage,
				orderType: strategy.tradeParameters.orderType,
				marketType: strategy.marketType,
				tradeType: side === "buy" ? "long" : "short",
			};
		});
		return [...held, ...fresh];
	}

	private holdCandidate(strategy: StrategyDefinition, trade: TradeRecord): CandidateTrade {
		const levels = this.risk.priceRisk(trade.entryPrice, trade.side, strategy.riskParameters);
		return {
			tradeId: trade.tradeId,
			strategyId: trade.strategyId,
			asset: trade.asset,
			side: trade.side,
			amount: trade.amount,
			entryPrice: trade.entryPrice,
			budgetAllocation: trade.budgetAllocation,
			stopLoss: levels.stopLoss,
			takeProfit: levels.takeProfit,
			trailingStop: levels.trailingStop,
			leverage: trade.leverage ?? strategy.tradeParameters.leverage,
			orderType: trade.orderType ?? strategy.tradeParameters.orderType,
			marketType: trade.marketType ?? strategy.marketType,
			tradeType: trade.tradeType ?? (trade.side === "buy" ? "long" : "short"),
		};
	}
}
