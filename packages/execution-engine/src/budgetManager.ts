import { createLogger, type ModuleLogger } from "@tradeloop/core";
import type { KeyValueStore } from "@tradeloop/persistence";
import { KeyedLock } from "@tradeloop/trade-lifecycle";

export const budgetKey = (strategyId: string): string => `budget:${strategyId}`;

export interface BudgetManagerOptions {
	/** Budget reported for strategies that have none stored. */
	defaultBudget?: number;
	logger?: ModuleLogger;
}

/**
 * Per-strategy quote-currency budgets kept as scalars in the store. Debits
 * and credits for one strategy are serialized.
 */
export class BudgetManager {
	private readonly lock = new KeyedLock();
	private readonly defaultBudget: number;
	private readonly logger: ModuleLogger;

	constructor(
		private readonly store: KeyValueStore,
		options: BudgetManagerOptions = {}
	) {
		this.defaultBudget = options.defaultBudget ?? 0;
		this.logger = options.logger ?? createLogger("budget-manager");
	}

	async getBudget(strategyId: string): Promise<number> {
		const raw = await this.store.get(budgetKey(strategyId));
		if (raw === null) {
			return this.defaultBudget;
		}
		const value = Number(raw);
		if (!Number.isFinite(value)) {
			this.logger.warn("budget_corrupt", { strategyId, raw });
			return 0;
		}
		return value;
	}

	async setBudget(strategyId: string, amount: number): Promise<void> {
		await this.lock.run(strategyId, () => this.write(strategyId, amount));
	}

	/** Never drives the budget below zero; the shortfall is logged. */
	async debit(strategyId: string, amount: number): Promise<number> {
		return this.lock.run(strategyId, async () => {
			const current = await this.getBudget(strategyId);
			const next = current - amount;
			if (next < 0) {
				this.logger.warn("budget_overdrawn", {
					strategyId,
					budget: current,
					debit: amount,
				});
			}
			const clamped = Math.max(next, 0);
			await this.write(strategyId, clamped);
			return clamped;
		});
	}

	async credit(strategyId: string, amount: number): Promise<number> {
		return this.lock.run(strategyId, async () => {
			const next = Math.max((await this.getBudget(strategyId)) + amount, 0);
			await this.write(strategyId, next);
			return next;
		});
	}

	async removeBudget(strategyId: string): Promise<void> {
		await this.store.delete(budgetKey(strategyId));
		this.logger.info("budget_removed", { strategyId });
	}

	private async write(strategyId: string, amount: number): Promise<void> {
		if (!Number.isFinite(amount) || amount < 0) {
			this.logger.error("budget_rejected", { strategyId, amount });
			throw new RangeError(
				`Budget for "${strategyId}" must be a non-negative number, got ${amount}`
			);
		}
		await this.store.set(budgetKey(strategyId), String(amount));
		this.logger.info("budget_updated", { strategyId, budget: amount });
	}
}
