/**
 * One mutation inside an atomic `commit`. `hset` merges the given fields into
 * the hash; pair it with `del` to replace a hash outright.
 */
export type StoreOp =
	| { op: "set"; key: string; value: string }
	| { op: "hset"; key: string; fields: Record<string, string> }
	| { op: "sadd"; key: string; member: string }
	| { op: "srem"; key: string; member: string }
	| { op: "del"; key: string };

/**
 * Key-value and set-membership store. No relational queries: callers keep
 * their own index sets.
 */
export interface KeyValueStore {
	get(key: string): Promise<string | null>;
	set(key: string, value: string): Promise<void>;
	delete(key: string): Promise<void>;
	hgetall(key: string): Promise<Record<string, string> | null>;
	hset(key: string, fields: Record<string, string>): Promise<void>;
	sadd(key: string, member: string): Promise<void>;
	srem(key: string, member: string): Promise<void>;
	smembers(key: string): Promise<string[]>;
	sismember(key: string, member: string): Promise<boolean>;
	/** Keys of scalars and hashes starting with `prefix`, sorted. */
	keys(prefix: string): Promise<string[]>;
	/** Apply every op or none. Readers never observe a partial commit. */
	commit(ops: StoreOp[]): Promise<void>;
	close(): Promise<void>;
}
