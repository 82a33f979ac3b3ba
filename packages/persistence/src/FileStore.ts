import fs from "node:fs";
import path from "node:path";
import { createLogger } from "@tradeloop/core";

import { InMemoryStore, toSnapshot, type StoreSnapshot } from "./InMemoryStore";

const logger = createLogger("file-store");

const isStringRecord = (value: unknown): value is Record<string, string> =>
	typeof value === "object" &&
	value !== null &&
	!Array.isArray(value) &&
	Object.values(value).every((entry) => typeof entry === "string");

const parseSnapshot = (raw: unknown, filePath: string): StoreSnapshot => {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		throw new Error(`Store file ${filePath} is not a JSON object`);
	}
	const record = Object.fromEntries(Object.entries(raw));
	const strings = record.strings ?? {};
	const hashes = record.hashes ?? {};
	const sets = record.sets ?? {};

	if (!isStringRecord(strings)) {
		throw new Error(`Store file ${filePath} has malformed "strings"`);
	}
	const snapshot: StoreSnapshot = { strings, hashes: {}, sets: {} };
	if (typeof hashes !== "object" || hashes === null) {
		throw new Error(`Store file ${filePath} has malformed "hashes"`);
	}
	for (const [key, fields] of Object.entries(hashes)) {
		if (!isStringRecord(fields)) {
			throw new Error(`Store file ${filePath} has malformed hash "${key}"`);
		}
		snapshot.hashes[key] = fields;
	}
	if (typeof sets !== "object" || sets === null) {
		throw new Error(`Store file ${filePath} has malformed "sets"`);
	}
	for (const [key, members] of Object.entries(sets)) {
		if (
			!Array.isArray(members) ||
			!members.every((member): member is string => typeof member === "string")
		) {
			throw new Error(`Store file ${filePath} has malformed set "${key}"`);
		}
		snapshot.sets[key] = members;
	}
	return snapshot;
};

/**
 * JSON-file driver. The whole snapshot is rewritten through a temp file and a
 * rename on every commit, so the file always holds a complete commit.
 */
export class FileStore extends InMemoryStore {
	constructor(private readonly filePath: string) {
		super();
		this.load();
	}

	private load(): void {
		if (!fs.existsSync(this.filePath)) {
			return;
		}
		const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
		this.restore(parseSnapshot(raw, this.filePath));
		logger.info("store_loaded", { path: this.filePath });
	}

	protected override persist(state: {
		strings: Map<string, string>;
		hashes: Map<string, Map<string, string>>;
		sets: Map<string, Set<string>>;
	}): void {
		const snapshot = toSnapshot(state.strings, state.hashes, state.sets);
		fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
		const tmpPath = `${this.filePath}.tmp`;
		fs.writeFileSync(tmpPath, JSON.stringify(snapshot, null, 2), {
			encoding: "utf-8",
		});
		fs.renameSync(tmpPath, this.filePath);
	}
}
