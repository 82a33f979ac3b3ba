import { describe, expect, it } from "vitest";
import { KeyedLock } from "./KeyedLock";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("KeyedLock", () => {
	it("runs work for one key in order", async () => {
		const lock = new KeyedLock();
		const events: string[] = [];

		await Promise.all([
			lock.run("k", async () => {
				events.push("first:start");
				await tick();
				events.push("first:end");
			}),
			lock.run("k", async () => {
				events.push("second:start");
			}),
		]);

		expect(events).toEqual(["first:start", "first:end", "second:start"]);
		expect(lock.size).toBe(0);
	});

	it("does not block other keys", async () => {
		const lock = new KeyedLock();
		const events: string[] = [];

		await Promise.all([
			lock.run("a", async () => {
				events.push("a:start");
				await tick();
				events.push("a:end");
			}),
			lock.run("b", async () => {
				events.push("b:start");
			}),
		]);

		expect(events.indexOf("b:start")).toBeLessThan(events.indexOf("a:end"));
	});

	it("releases the key when work throws", async () => {
		const lock = new KeyedLock();
		await expect(
			lock.run("k", async () => {
				throw new Error("boom");
			})
		).rejects.toThrow("boom");
		await expect(lock.run("k", async () => "after")).resolves.toBe("after");
	});
});
