import type { KeyValueStore, StoreOp } from "./types";

export interface StoreSnapshot {
	strings: Record<string, string>;
	hashes: Record<string, Record<string, string>>;
	sets: Record<string, string[]>;
}

export class InMemoryStore implements KeyValueStore {
	protected strings = new Map<string, string>();
	protected hashes = new Map<string, Map<string, string>>();
	protected sets = new Map<string, Set<string>>();

	async get(key: string): Promise<string | null> {
		return this.strings.get(key) ?? null;
	}

	async set(key: string, value: string): Promise<void> {
		await this.commit([{ op: "set", key, value }]);
	}

	async delete(key: string): Promise<void> {
		await this.commit([{ op: "del", key }]);
	}

	async hgetall(key: string): Promise<Record<string, string> | null> {
		const hash = this.hashes.get(key);
		return hash ? Object.fromEntries(hash) : null;
	}

	async hset(key: string, fields: Record<string, string>): Promise<void> {
		await this.commit([{ op: "hset", key, fields }]);
	}

	async sadd(key: string, member: string): Promise<void> {
		await this.commit([{ op: "sadd", key, member }]);
	}

	async srem(key: string, member: string): Promise<void> {
		await this.commit([{ op: "srem", key, member }]);
	}

	async smembers(key: string): Promise<string[]> {
		return [...(this.sets.get(key) ?? [])].sort();
	}

	async sismember(key: string, member: string): Promise<boolean> {
		return this.sets.get(key)?.has(member) ?? false;
	}

	async keys(prefix: string): Promise<string[]> {
		return [...this.strings.keys(), ...this.hashes.keys()]
			.filter((key) => key.startsWith(prefix))
			.sort();
	}

	async commit(ops: StoreOp[]): Promise<void> {
		// Ops land on copies that replace the live maps only after persist
		// returns; a failed write leaves the previous commit visible.
		const strings = new Map(this.strings);
		const hashes = new Map(this.hashes);
		const sets = new Map(this.sets);

		for (const op of ops) {
			switch (op.op) {
				case "set":
					strings.set(op.key, op.value);
					break;
				case "hset": {
					const hash = new Map<string, string>(hashes.get(op.key) ?? []);
					for (const [field, value] of Object.entries(op.fields)) {
						hash.set(field, value);
					}
					hashes.set(op.key, hash);
					break;
				}
				case "sadd": {
					const members = new Set<string>(sets.get(op.key) ?? []);
					members.add(op.member);
					sets.set(op.key, members);
					break;
				}
				case "srem": {
					const members = new Set<string>(sets.get(op.key) ?? []);
					members.delete(op.member);
					if (members.size) {
						sets.set(op.key, members);
					} else {
						sets.delete(op.key);
					}
					break;
				}
				case "del":
					strings.delete(op.key);
					hashes.delete(op.key);
					sets.delete(op.key);
					break;
			}
		}

		this.persist({ strings, hashes, sets });
		this.strings = strings;
		this.hashes = hashes;
		this.sets = sets;
	}

	async close(): Promise<void> {
		// nothing to release
	}

	snapshot(): StoreSnapshot {
		return toSnapshot(this.strings, this.hashes, this.sets);
	}

	protected restore(snapshot: StoreSnapshot): void {
		this.strings = new Map(Object.entries(snapshot.strings));
		this.hashes = new Map(
			Object.entries(snapshot.hashes).map(([key, fields]) => [
				key,
				new Map(Object.entries(fields)),
			])
		);
		this.sets = new Map(
			Object.entries(snapshot.sets).map(([key, members]) => [
				key,
				new Set(members),
			])
		);
	}

	/** Hook for durable drivers; runs before the new state becomes visible. */
	protected persist(_state: {
		strings: Map<string, string>;
		hashes: Map<string, Map<string, string>>;
		sets: Map<string, Set<string>>;
	}): void {
		// in-memory only
	}
}

export const toSnapshot = (
	strings: Map<string, string>,
	hashes: Map<string, Map<string, string>>,
	sets: Map<string, Set<string>>
): StoreSnapshot => ({
	strings: Object.fromEntries(strings),
	hashes: Object.fromEntries(
		[...hashes].map(([key, hash]) => [key, Object.fromEntries(hash)])
	),
	sets: Object.fromEntries(
		[...sets].map(([key, members]) => [key, [...members].sort()])
	),
});
