export type ArgValue = string | boolean;

export const COMMANDS = ["run", "import", "budget", "reconcile", "list", "remove"] as const;
export type Command = (typeof COMMANDS)[number];

export interface ParsedCli {
	command: Command;
	args: Record<string, ArgValue>;
}

const isCommand = (value: string): value is Command =>
	COMMANDS.some((command) => command === value);

export const parseCliArgs = (argv: string[]): ParsedCli => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}

	const [first = "run", second] = positionals;
	if (!isCommand(first)) {
		throw new Error(`Unknown command "${first}" (expected ${COMMANDS.join(", ")})`);
	}
	// `budget <strategy> <amount>` shorthand
	if (first === "budget") {
		if (second && args.strategy === undefined) {
			args.strategy = second;
		}
		if (positionals[2] && args.amount === undefined) {
			args.amount = positionals[2];
		}
	}
	if (first === "remove" && second && args.strategy === undefined) {
		args.strategy = second;
	}
	return { command: first, args };
};

export const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
};

export const getNumberArg = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const value = getStringArg(args, key);
	if (value === undefined) {
		return undefined;
	}
	const parsed = Number(value);
	if (!Number.isFinite(parsed)) {
		throw new Error(`--${key} must be numeric, got "${value}"`);
	}
	return parsed;
};

export const getBooleanArg = (
	args: Record<string, ArgValue>,
	key: string
): boolean => args[key] === true || args[key] === "true";
