import { createLogger, type ModuleLogger, type TradeRecord } from "@tradeloop/core";

import type { TradeUpdateNotifier } from "./types";

export class LoggingTradeNotifier implements TradeUpdateNotifier {
	constructor(private readonly logger: ModuleLogger = createLogger("trade-updates")) {}

	onTradesUpdated(strategyId: string, trades: TradeRecord[]): void {
		this.logger.info("trades_updated", {
			strategyId,
			count: trades.length,
			trades: trades.map((trade) => ({
				tradeId: trade.tradeId,
				asset: trade.asset,
				side: trade.side,
				amount: trade.amount,
				status: trade.status,
			})),
		});
	}
}

/** Fans one update out to several notifiers; each failure is isolated. */
export class CompositeTradeNotifier implements TradeUpdateNotifier {
	private readonly logger = createLogger("trade-updates");

	constructor(private readonly notifiers: TradeUpdateNotifier[]) {}

	async onTradesUpdated(strategyId: string, trades: TradeRecord[]): Promise<void> {
		const results = await Promise.allSettled(
			this.notifiers.map(async (notifier) => notifier.onTradesUpdated(strategyId, trades))
		);
		results.forEach((result, index) => {
			if (result.status === "rejected") {
				this.logger.warn("trade_notifier_failed", {
					strategyId,
					notifier: index,
					error: result.reason instanceof Error ? result.reason.message : String(result.reason),
				});
			}
		});
	}
}
