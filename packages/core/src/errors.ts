/**
 * Configuration errors point at a corrupt strategy definition. They are fatal
 * to the evaluation being attempted and are never converted into a `false`
 * signal.
 */
export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class UnsupportedOperatorError extends ConfigurationError {
	constructor(readonly operator: string) {
		super(`Unsupported comparison operator: "${operator}"`);
	}
}

export class UnsupportedTimeframeError extends ConfigurationError {
	constructor(readonly timeframe: string, detail?: string) {
		super(
			`Unsupported timeframe: "${timeframe}"${detail ? ` (${detail})` : ""}`
		);
	}
}

export class UnsupportedIndicatorError extends ConfigurationError {
	constructor(readonly indicator: string) {
		super(`Unsupported indicator: "${indicator}"`);
	}
}

export class StrategyValidationError extends ConfigurationError {
	constructor(readonly strategyId: string, readonly issues: string[]) {
		super(`Strategy "${strategyId}" is invalid: ${issues.join("; ")}`);
	}
}

export class StrategyNotFoundError extends Error {
	constructor(readonly strategyId: string) {
		super(`Strategy with ID "${strategyId}" does not exist`);
		this.name = "StrategyNotFoundError";
	}
}

export class BudgetExceededError extends Error {
	constructor(readonly allocated: number, readonly budget: number) {
		super(
			`Total budget allocation exceeds the budget: ${allocated} > ${budget}`
		);
		this.name = "BudgetExceededError";
	}
}

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
