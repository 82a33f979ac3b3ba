/**
 * Persistence drivers behind the `KeyValueStore` capability interface.
 */
import path from "node:path";

import { FileStore } from "./FileStore";
import { InMemoryStore } from "./InMemoryStore";
import type { KeyValueStore } from "./types";

export * from "./types";
export * from "./InMemoryStore";
export * from "./FileStore";

export interface PersistenceOptions {
	driver: "memory" | "file";
	/** Snapshot path for the file driver, resolved against `baseDir`. */
	path?: string;
	baseDir?: string;
}

export const createStore = (options: PersistenceOptions): KeyValueStore => {
	if (options.driver === "memory") {
		return new InMemoryStore();
	}
	const filePath = path.resolve(
		options.baseDir ?? process.cwd(),
		options.path ?? path.join("data", "store.json")
	);
	return new FileStore(filePath);
};
