import {
	createLogger,
	describeError,
	type MarketDataClient,
	type ModuleLogger,
	type StrategyDefinition,
} from "@tradeloop/core";
import { calcStrategyPerformance, type StrategyPerformance } from "@tradeloop/metrics";
import type {
	MarketDataSnapshot,
	ReconciliationEngine,
	ReconciliationResult,
} from "@tradeloop/reconciliation";
import type { TradeLifecycle } from "@tradeloop/trade-lifecycle";

import { PeriodicTask } from "./periodicTask";
import type { ActiveStrategySource } from "./types";

export const DEFAULT_RECONCILE_INTERVAL_MS = 900_000;

export interface BudgetSource {
	getBudget(strategyId: string): Promise<number>;
}

export interface ReconciliationSchedulerOptions {
	strategies: ActiveStrategySource;
	marketData: MarketDataClient;
	reconciler: Pick<ReconciliationEngine, "reconcile">;
	budgets: BudgetSource;
	lifecycle: TradeLifecycle;
	intervalMs?: number;
	logger?: ModuleLogger;
}

export interface StrategyCycleResult {
	strategyId: string;
	reconciliation?: ReconciliationResult;
	performance?: StrategyPerformance;
	error?: string;
}

/**
 * Periodically re-derives each active strategy's trade set from fresh
 * tickers and logs its performance afterwards.
 */
export class ReconciliationScheduler {
	private readonly logger: ModuleLogger;
	private readonly task: PeriodicTask;

	constructor(private readonly options: ReconciliationSchedulerOptions) {
		this.logger = options.logger ?? createLogger("reconciliation-scheduler");
		this.task = new PeriodicTask(
			"reconciliation",
			options.intervalMs ?? DEFAULT_RECONCILE_INTERVAL_MS,
			() => this.runCycle(),
			this.logger
		);
	}

	start(): void {
		this.task.start();
	}

	stop(): Promise<void> {
		return this.task.stop();
	}

	async runCycle(): Promise<StrategyCycleResult[]> {
		const strategies = await this.options.strategies.getActiveStrategies();
		return Promise.all(strategies.map((strategy) => this.reconcileStrategy(strategy)));
	}

	private async reconcileStrategy(strategy: StrategyDefinition): Promise<StrategyCycleResult> {
		const result: StrategyCycleResult = { strategyId: strategy.id };
		try {
			const snapshot = await this.buildSnapshot(strategy);
			const budget = await this.strategyCapital(strategy.id);
			result.reconciliation = await this.options.reconciler.reconcile(
				strategy,
				snapshot,
				budget
			);
		} catch (error) {
			result.error = describeError(error);
			this.logger.error("strategy_reconciliation_failed", {
				strategyId: strategy.id,
				error: result.error,
			});
		}

		try {
			const closed = await this.options.lifecycle.listByStrategy(strategy.id, ["closed"]);
			result.performance = calcStrategyPerformance(strategy.id, closed);
			this.logger.info("strategy_performance", { ...result.performance });
		} catch (error) {
			this.logger.warn("strategy_performance_failed", {
				strategyId: strategy.id,
				error: describeError(error),
			});
		}
		return result;
	}

	/** Available budget plus what the strategy's filled trades hold. */
	private async strategyCapital(strategyId: string): Promise<number> {
		const [available, active] = await Promise.all([
			this.options.budgets.getBudget(strategyId),
			this.options.lifecycle.listByStrategy(strategyId, ["active"]),
		]);
		return active.reduce((sum, trade) => sum + trade.budgetAllocation, available);
	}

	/** Assets whose ticker cannot be fetched are left out of the snapshot. */
	private async buildSnapshot(strategy: StrategyDefinition): Promise<MarketDataSnapshot> {
		const snapshot: MarketDataSnapshot = {};
		await Promise.all(
			strategy.assets.map(async (asset) => {
				try {
					snapshot[asset] = await this.options.marketData.fetchTicker(
						asset,
						strategy.marketType
					);
				} catch (error) {
					this.logger.warn("ticker_unavailable", {
						strategyId: strategy.id,
						asset,
						error: describeError(error),
					});
				}
			})
		);
		return snapshot;
	}
}
