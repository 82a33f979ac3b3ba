import {
	createLogger,
	type MarketDataClient,
	type OrderGateway,
	type TradeloopConfig,
} from "@tradeloop/core";
import { CcxtExchangeClient } from "@tradeloop/exchange-ccxt";
import {
	BudgetManager,
	PaperAccount,
	PaperOrderGateway,
	TradeExecutor,
} from "@tradeloop/execution-engine";
import { createStore, type KeyValueStore } from "@tradeloop/persistence";
import {
	LoggingTradeNotifier,
	ReconciliationEngine,
	RuleBasedSuggestionService,
	type SuggestionService,
	type TradeUpdateNotifier,
} from "@tradeloop/reconciliation";
import { StrategyStore } from "@tradeloop/strategy-engine";
import { TradeLifecycle } from "@tradeloop/trade-lifecycle";

import { MonitoringLoop } from "./monitoringLoop";
import { ReconciliationScheduler } from "./reconciliationScheduler";

const monitorLogger = createLogger("monitor-runtime");

export interface StartMonitorOptions {
	config: TradeloopConfig;
	store?: KeyValueStore;
	/** Market data and, in live mode, order routing. Defaults to a ccxt client. */
	exchange?: MarketDataClient & OrderGateway;
	suggestions?: SuggestionService;
	notifier?: TradeUpdateNotifier;
	/** Start the periodic loops. Off for one-shot commands. */
	autoStart?: boolean;
}

export interface MonitorRuntime {
	store: KeyValueStore;
	strategies: StrategyStore;
	lifecycle: TradeLifecycle;
	budgets: BudgetManager;
	executor: TradeExecutor;
	loop: MonitoringLoop;
	scheduler: ReconciliationScheduler;
	/** Deletes a strategy and its budget. Refused while it has open trades. */
	removeStrategy(strategyId: string): Promise<void>;
	stop(): Promise<void>;
}

/** Builds the monitor's object graph from configuration. */
export const startMonitor = (options: StartMonitorOptions): MonitorRuntime => {
	const { config } = options;
	const { env, monitor } = config;

	const store =
		options.store ??
		createStore({
			driver: env.storeDriver,
			path: env.storePath,
			baseDir: config.workspaceRoot,
		});
	const exchange = options.exchange ?? CcxtExchangeClient.create(config.exchange);
	const gateway: OrderGateway =
		env.executionMode === "live"
			? exchange
			: new PaperOrderGateway({
					marketData: exchange,
					account: new PaperAccount(monitor.paperStartingBalance),
				});

	const strategies = new StrategyStore(store);
	const lifecycle = new TradeLifecycle(store, { maxRetries: monitor.maxRetries });
	const budgets = new BudgetManager(store, { defaultBudget: monitor.defaultBudget });
	const executor = new TradeExecutor({
		lifecycle,
		gateway,
		marketData: exchange,
		budgets,
	});
	const reconciler = new ReconciliationEngine({
		lifecycle,
		suggestions: options.suggestions ?? new RuleBasedSuggestionService(),
		notifier: options.notifier ?? new LoggingTradeNotifier(),
		positions: executor,
	});

	const loop = new MonitoringLoop({
		strategies,
		marketData: exchange,
		executor,
		lifecycle,
		pollIntervalMs: monitor.pollIntervalMs,
		ohlcvLimit: monitor.ohlcvLimit,
	});
	const scheduler = new ReconciliationScheduler({
		strategies,
		marketData: exchange,
		reconciler,
		budgets,
		lifecycle,
		intervalMs: monitor.reconcileIntervalMs,
	});

	monitorLogger.info("monitor_config", {
		exchange: config.exchange.exchange,
		marketType: config.exchange.defaultMarketType,
		testnet: config.exchange.testnet,
		executionMode: env.executionMode,
		storeDriver: env.storeDriver,
		pollIntervalMs: monitor.pollIntervalMs,
		reconcileIntervalMs: monitor.reconcileIntervalMs,
	});

	if (options.autoStart ?? true) {
		loop.start();
		scheduler.start();
	}

	return {
		store,
		strategies,
		lifecycle,
		budgets,
		executor,
		loop,
		scheduler,
		removeStrategy: async (strategyId) => {
			const open = await lifecycle.listOpenByStrategy(strategyId);
			if (open.length > 0) {
				throw new Error(
					`Strategy "${strategyId}" still has ${open.length} open trade(s); close them first`
				);
			}
			await strategies.remove(strategyId);
			await budgets.removeBudget(strategyId);
		},
		stop: async () => {
			await Promise.all([loop.stop(), scheduler.stop()]);
			await store.close();
			monitorLogger.info("monitor_stopped");
		},
	};
};
