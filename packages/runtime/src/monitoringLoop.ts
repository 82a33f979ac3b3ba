import {
	ConfigurationError,
	createLogger,
	describeError,
	type MarketDataClient,
	type ModuleLogger,
	type StrategyDefinition,
	type TradeRecord,
} from "@tradeloop/core";
import {
	DEFAULT_INDICATOR_PROVIDERS,
	IndicatorCache,
	type IndicatorProvider,
} from "@tradeloop/indicators";
import { ConditionEvaluator, resolveTimeframe } from "@tradeloop/strategy-engine";
import type { TradeLifecycle } from "@tradeloop/trade-lifecycle";

import { PeriodicTask } from "./periodicTask";
import type { ActiveStrategySource, PassSummary, SignalExecutor } from "./types";

export const DEFAULT_POLL_INTERVAL_MS = 60_000;
export const DEFAULT_OHLCV_LIMIT = 300;

export interface MonitoringLoopOptions {
	strategies: ActiveStrategySource;
	marketData: MarketDataClient;
	executor: SignalExecutor;
	lifecycle: TradeLifecycle;
	pollIntervalMs?: number;
	ohlcvLimit?: number;
	providers?: readonly IndicatorProvider[];
	now?: () => number;
	logger?: ModuleLogger;
}

type PassCounters = Omit<PassSummary, "pass" | "durationMs">;

/**
 * One pass evaluates every asset of every active strategy. Strategies and
 * their assets fan out concurrently; a failure is confined to its own branch.
 */
export class MonitoringLoop {
	private readonly pollIntervalMs: number;
	private readonly ohlcvLimit: number;
	private readonly providers: readonly IndicatorProvider[];
	private readonly now: () => number;
	private readonly logger: ModuleLogger;
	private readonly task: PeriodicTask;
	private passes = 0;

	constructor(private readonly options: MonitoringLoopOptions) {
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
		this.ohlcvLimit = options.ohlcvLimit ?? DEFAULT_OHLCV_LIMIT;
		this.providers = options.providers ?? DEFAULT_INDICATOR_PROVIDERS;
		this.now = options.now ?? Date.now;
		this.logger = options.logger ?? createLogger("monitor");
		this.task = new PeriodicTask(
			"monitoring_loop",
			this.pollIntervalMs,
			() => this.runPass(),
			this.logger
		);
	}

	start(): void {
		this.task.start();
	}

	stop(): Promise<void> {
		return this.task.stop();
	}

	async runPass(): Promise<PassSummary> {
		this.passes += 1;
		const pass = this.passes;
		const startedAt = this.now();
		const counters: PassCounters = {
			strategies: 0,
			assets: 0,
			entrySignals: 0,
			exitSignals: 0,
			failures: 0,
		};

		let strategies: StrategyDefinition[] = [];
		try {
			strategies = await this.options.strategies.getActiveStrategies();
		} catch (error) {
			counters.failures += 1;
			this.logger.error("active_strategies_unavailable", {
				pass,
				error: describeError(error),
			});
		}
		counters.strategies = strategies.length;

		await Promise.all(strategies.map((strategy) => this.runStrategy(strategy, counters)));

		const summary: PassSummary = {
			pass,
			...counters,
			durationMs: this.now() - startedAt,
		};
		this.logger.info("pass_summary", { ...summary });
		return summary;
	}

	private async runStrategy(
		strategy: StrategyDefinition,
		counters: PassCounters
	): Promise<void> {
		await this.drainPending(strategy, counters);

		let timeframe: string;
		try {
			timeframe = resolveTimeframe(strategy);
		} catch (error) {
			counters.failures += 1;
			this.logger.error("strategy_timeframe_invalid", {
				strategyId: strategy.id,
				error: describeError(error),
			});
			return;
		}

		counters.assets += strategy.assets.length;
		await Promise.all(
			strategy.assets.map((asset) => this.runAsset(strategy, asset, timeframe, counters))
		);
	}

	/**
	 * Pending trades without an order are submitted; those with one are
	 * checked against the venue.
	 */
	private async drainPending(
		strategy: StrategyDefinition,
		counters: PassCounters
	): Promise<void> {
		let pending: TradeRecord[];
		try {
			pending = await this.options.lifecycle.listByStrategy(strategy.id, ["pending"]);
		} catch (error) {
			counters.failures += 1;
			this.logger.error("pending_trades_unavailable", {
				strategyId: strategy.id,
				error: describeError(error),
			});
			return;
		}

		for (const trade of pending) {
			try {
				if (trade.orderId) {
					await this.options.executor.syncOrder(trade);
				} else {
					await this.options.executor.executeTrade(trade);
				}
			} catch (error) {
				counters.failures += 1;
				this.logger.error("pending_trade_failed", {
					strategyId: strategy.id,
					tradeId: trade.tradeId,
					error: describeError(error),
				});
			}
		}
	}

	private async runAsset(
		strategy: StrategyDefinition,
		asset: string,
		timeframe: string,
		counters: PassCounters
	): Promise<void> {
		try {
			const candles = await this.options.marketData.fetchOHLCV(
				asset,
				timeframe,
				this.ohlcvLimit,
				strategy.marketType
			);
			if (!candles.length) {
				this.logger.warn("market_data_empty", {
					strategyId: strategy.id,
					asset,
					timeframe,
				});
				return;
			}

			// Scoped to this asset and pass; dropped when the branch returns.
			const cache = new IndicatorCache(candles, this.providers);
			const evaluator = new ConditionEvaluator(cache, {
				context: { strategyId: strategy.id, asset },
			});
			const entry = strategy.entryConditions.length
				? evaluator.evaluate(strategy.entryConditions)
				: false;
			const exit = strategy.exitConditions.length
				? evaluator.evaluate(strategy.exitConditions)
				: false;
			this.logger.debug("signal_evaluated", {
				strategyId: strategy.id,
				asset,
				timeframe,
				entry,
				exit,
				indicators: cache.size,
			});

			const open = (await this.options.lifecycle.listOpenByStrategy(strategy.id)).filter(
				(trade) => trade.asset === asset
			);

			if (exit) {
				counters.exitSignals += 1;
				for (const trade of open.filter((candidate) => candidate.status === "active")) {
					await this.options.executor.closeTrade(trade, "exit_signal");
				}
			}
			if (entry) {
				counters.entrySignals += 1;
				if (open.length === 0) {
					await this.options.executor.openPosition(strategy, asset);
				} else {
					this.logger.debug("entry_skipped_open_trade", {
						strategyId: strategy.id,
						asset,
						openTrades: open.length,
					});
				}
			}
		} catch (error) {
			counters.failures += 1;
			this.logger.error("asset_evaluation_failed", {
				strategyId: strategy.id,
				asset,
				configuration: error instanceof ConfigurationError,
				error: describeError(error),
			});
		}
	}
}
