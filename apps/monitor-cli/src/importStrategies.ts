import { createLogger, describeError } from "@tradeloop/core";
import type { StrategyStore } from "@tradeloop/strategy-engine";

const logger = createLogger("strategy-import");

export interface StrategyFile {
	path: string;
	contents: unknown;
}

export interface ImportSummary {
	saved: string[];
	activated: string[];
	failed: Array<{ path: string; error: string }>;
}

/**
 * Saves each definition file into the store. A file that fails validation is
 * reported and the rest still import. With `activate`, only strategies that
 * are complete are switched on.
 */
export const importStrategies = async (
	strategies: StrategyStore,
	files: StrategyFile[],
	options: { activate?: boolean } = {}
): Promise<ImportSummary> => {
	const summary: ImportSummary = { saved: [], activated: [], failed: [] };
	for (const file of files) {
		try {
			const definition = await strategies.save(file.contents);
			summary.saved.push(definition.id);
			if (options.activate && (await strategies.isComplete(definition.id))) {
				await strategies.activate(definition.id);
				summary.activated.push(definition.id);
			}
		} catch (error) {
			const message = describeError(error);
			logger.error("strategy_import_failed", { path: file.path, error: message });
			summary.failed.push({ path: file.path, error: message });
		}
	}
	logger.info("strategy_import_summary", {
		saved: summary.saved.length,
		activated: summary.activated.length,
		failed: summary.failed.length,
	});
	return summary;
};
