import {
	createLogger,
	describeError,
	loadStrategyFiles,
	loadTradeloopConfig,
} from "@tradeloop/core";
import { startMonitor, type MonitorRuntime } from "@tradeloop/runtime";

import {
	getBooleanArg,
	getNumberArg,
	getStringArg,
	parseCliArgs,
	type ArgValue,
} from "./cliArgs";
import { importStrategies } from "./importStrategies";

const logger = createLogger("monitor-cli");

const runImport = async (
	runtime: MonitorRuntime,
	configDir: string,
	args: Record<string, ArgValue>
): Promise<void> => {
	const summary = await importStrategies(runtime.strategies, loadStrategyFiles(configDir), {
		activate: getBooleanArg(args, "activate"),
	});
	if (summary.failed.length > 0) {
		process.exitCode = 1;
	}
};

const runBudget = async (
	runtime: MonitorRuntime,
	args: Record<string, ArgValue>
): Promise<void> => {
	const strategyId = getStringArg(args, "strategy");
	const amount = getNumberArg(args, "amount");
	if (!strategyId || amount === undefined) {
		throw new Error("budget requires --strategy <id> and --amount <value>");
	}
	await runtime.budgets.setBudget(strategyId, amount);
	logger.info("budget_set", { strategyId, amount });
};

const runRemove = async (
	runtime: MonitorRuntime,
	args: Record<string, ArgValue>
): Promise<void> => {
	const strategyId = getStringArg(args, "strategy");
	if (!strategyId) {
		throw new Error("remove requires --strategy <id>");
	}
	await runtime.removeStrategy(strategyId);
};

const waitForShutdown = (runtime: MonitorRuntime): Promise<void> =>
	new Promise((resolve, reject) => {
		const shutdown = (signal: NodeJS.Signals): void => {
			logger.info("monitor_shutdown", { signal });
			runtime.stop().then(resolve, reject);
		};
		process.once("SIGINT", shutdown);
		process.once("SIGTERM", shutdown);
	});

const main = async (): Promise<void> => {
	const { command, args } = parseCliArgs(process.argv.slice(2));
	const config = loadTradeloopConfig({
		configDir: getStringArg(args, "config"),
		monitorProfile: getStringArg(args, "profile"),
		exchangeProfile: getStringArg(args, "exchange"),
	});
	const runtime = startMonitor({ config, autoStart: false });
	logger.info("cli_starting", { command, executionMode: config.env.executionMode });

	if (command === "run") {
		if (getBooleanArg(args, "import")) {
			await runImport(runtime, config.configDir, { activate: true });
		}
		runtime.loop.start();
		runtime.scheduler.start();
		await waitForShutdown(runtime);
		return;
	}

	try {
		switch (command) {
			case "import":
				await runImport(runtime, config.configDir, args);
				break;
			case "budget":
				await runBudget(runtime, args);
				break;
			case "reconcile":
				await runtime.scheduler.runCycle();
				break;
			case "remove":
				await runRemove(runtime, args);
				break;
			case "list":
				logger.info("strategy_list", { strategies: await runtime.strategies.list() });
				break;
		}
	} finally {
		await runtime.stop();
	}
};

main().catch((error) => {
	logger.error("cli_failed", { error: describeError(error) });
	process.exit(1);
});
