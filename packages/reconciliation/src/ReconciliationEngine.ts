import {
	BudgetExceededError,
	TRADE_TERM_FIELDS,
	createLogger,
	describeError,
	type ModuleLogger,
	type StrategyDefinition,
	type TradeRecord,
	type TradeTerms,
} from "@tradeloop/core";
import type { TradeLifecycle } from "@tradeloop/trade-lifecycle";

import { normalizeCandidateTrade } from "./normalizeCandidateTrade";
import type {
	CandidateTrade,
	MarketDataSnapshot,
	PositionCloser,
	ReconciliationResult,
	SuggestionService,
	TradeUpdateNotifier,
} from "./types";

export interface ReconciliationEngineOptions {
	lifecycle: TradeLifecycle;
	suggestions: SuggestionService;
	notifier?: TradeUpdateNotifier;
	/** Closes dropped active trades at the venue; without it they are archived. */
	positions?: PositionCloser;
	logger?: ModuleLogger;
}

/** Relative slack for float rounding when allocations are summed. */
export const BUDGET_TOLERANCE = 1e-9;

export const exceedsBudget = (allocated: number, budget: number): boolean =>
	allocated - budget > BUDGET_TOLERANCE * Math.max(1, Math.abs(budget));

/**
 * Term fields whose candidate value differs from the stored trade. Fields a
 * candidate leaves unset are not compared.
 */
export const diffTradeTerms = (
	existing: TradeRecord,
	candidate: CandidateTrade
): Partial<TradeTerms> => {
	const changes: Partial<TradeTerms> = {};
	for (const field of TRADE_TERM_FIELDS) {
		const next = candidate[field];
		if (next !== undefined && next !== existing[field]) {
			Object.assign(changes, { [field]: next });
		}
	}
	return changes;
};

/**
 * Diffs a fresh suggestion batch against a strategy's open trades by trade
 * id: unknown ids are added as pending trades, known ids with changed terms
 * are updated in place, and open trades missing from the batch are archived.
 *
 * `budget` is the strategy's whole capital: what is still available plus the
 * allocations of its active trades, since a batch restates those too.
 */
export class ReconciliationEngine {
	private readonly lifecycle: TradeLifecycle;
	private readonly suggestions: SuggestionService;
	private readonly notifier?: TradeUpdateNotifier;
	private readonly positions?: PositionCloser;
	private readonly logger: ModuleLogger;

	constructor(options: ReconciliationEngineOptions) {
		this.lifecycle = options.lifecycle;
		this.suggestions = options.suggestions;
		this.notifier = options.notifier;
		this.positions = options.positions;
		this.logger = options.logger ?? createLogger("reconciliation");
	}

	async reconcile(
		strategy: StrategyDefinition,
		marketData: MarketDataSnapshot,
		budget: number
	): Promise<ReconciliationResult> {
		const strategyId = strategy.id;
		const openTrades = await this.lifecycle.listOpenByStrategy(strategyId);
		const rawCandidates = await this.suggestions.generateTrades(
			strategy,
			marketData,
			budget,
			openTrades
		);

		const { candidates, skipped } = this.normalizeBatch(strategyId, rawCandidates);
		const allocated = candidates.reduce(
			(sum, candidate) => sum + candidate.budgetAllocation,
			0
		);
		if (exceedsBudget(allocated, budget)) {
			this.logger.error("suggestion_budget_exceeded", {
				strategyId,
				allocated,
				budget,
			});
			throw new BudgetExceededError(allocated, budget);
		}

		const result: ReconciliationResult = {
			strategyId,
			additions: [],
			updates: [],
			removals: [],
			unchanged: [],
			skipped,
		};
		const openById = new Map(openTrades.map((trade) => [trade.tradeId, trade]));

		for (const candidate of candidates) {
			const existing = openById.get(candidate.tradeId);
			if (existing) {
				await this.applyUpdate(existing, candidate, result);
			} else {
				await this.applyAddition(candidate, result);
			}
		}

		const candidateIds = new Set(candidates.map((candidate) => candidate.tradeId));
		for (const trade of openTrades) {
			if (candidateIds.has(trade.tradeId)) {
				continue;
			}
			const removed = await this.remove(trade);
			if (removed) {
				result.removals.push(removed);
			}
		}

		await this.notify(strategyId, [...result.additions, ...result.updates]);

		this.logger.info("reconciliation_summary", {
			strategyId,
			added: result.additions.length,
			updated: result.updates.length,
			removed: result.removals.length,
			unchanged: result.unchanged.length,
			skipped: result.skipped,
			budget,
		});
		return result;
	}

	private normalizeBatch(
		strategyId: string,
		rawCandidates: unknown[]
	): { candidates: CandidateTrade[]; skipped: number } {
		const candidates: CandidateTrade[] = [];
		const seen = new Set<string>();
		let skipped = 0;

		rawCandidates.forEach((raw, index) => {
			const normalized = normalizeCandidateTrade(raw, strategyId);
			if (!normalized.ok) {
				skipped += 1;
				this.logger.warn("candidate_trade_invalid", {
					strategyId,
					index,
					issues: normalized.issues,
				});
				return;
			}
			if (seen.has(normalized.trade.tradeId)) {
				skipped += 1;
				this.logger.warn("candidate_trade_duplicate", {
					strategyId,
					tradeId: normalized.trade.tradeId,
				});
				return;
			}
			seen.add(normalized.trade.tradeId);
			candidates.push(normalized.trade);
		});

		return { candidates, skipped };
	}

	private async applyUpdate(
		existing: TradeRecord,
		candidate: CandidateTrade,
		result: ReconciliationResult
	): Promise<void> {
		const changes = diffTradeTerms(existing, candidate);
		if (Object.keys(changes).length === 0) {
			result.unchanged.push(existing.tradeId);
			return;
		}
		const updated = await this.lifecycle.update(existing.tradeId, changes);
		if (updated.ok) {
			result.updates.push(updated.trade);
			return;
		}
		this.logger.warn("candidate_trade_update_failed", {
			tradeId: existing.tradeId,
			reason: updated.reason,
		});
	}

	private async applyAddition(
		candidate: CandidateTrade,
		result: ReconciliationResult
	): Promise<void> {
		const created = await this.lifecycle.create(candidate);
		if (created.ok) {
			result.additions.push(created.trade);
			return;
		}
		// The id belongs to a trade that is already closed; history is read-only.
		result.skipped += 1;
		this.logger.warn("candidate_trade_conflict", {
			tradeId: candidate.tradeId,
			reason: created.reason,
		});
	}

	/**
	 * A filled position is unwound through the closer, which books its PnL
	 * and returns the allocation. If that fails the trade stays open for the
	 * next cycle.
	 */
	private async remove(trade: TradeRecord): Promise<TradeRecord | null> {
		if (trade.status === "active" && this.positions) {
			try {
				return await this.positions.closeTrade(trade, "reconciled_out");
			} catch (error) {
				this.logger.error("reconciled_close_failed", {
					tradeId: trade.tradeId,
					error: describeError(error),
				});
				return null;
			}
		}
		const archived = await this.lifecycle.archive(trade.tradeId, "reconciled_out");
		return archived.ok ? archived.trade : null;
	}

	private async notify(strategyId: string, trades: TradeRecord[]): Promise<void> {
		if (!this.notifier || trades.length === 0) {
			return;
		}
		try {
			await this.notifier.onTradesUpdated(strategyId, trades);
		} catch (error) {
			this.logger.warn("trade_notification_failed", {
				strategyId,
				error: describeError(error),
			});
		}
	}
}
