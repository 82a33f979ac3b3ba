import { describe, it, expect } from "vitest";
import { InMemoryStore } from "@tradeloop/persistence";
import { StrategyStore } from "@tradeloop/strategy-engine";

import { importStrategies } from "./importStrategies";

const definition = (id: string, withExit: boolean) => ({
	id,
	title: id,
	assets: ["BTC/USDT"],
	marketType: "spot",
	entryConditions: [{ indicator: "close", operator: ">", value: 100 }],
	exitConditions: withExit ? [{ indicator: "close", operator: "<", value: 90 }] : [],
	tradeParameters: { positionSize: 0.5 },
});

describe("importStrategies", () => {
	it("saves valid files and reports invalid ones", async () => {
		const strategies = new StrategyStore(new InMemoryStore());
		const summary = await importStrategies(strategies, [
			{ path: "a.json", contents: definition("alpha", true) },
			{ path: "b.json", contents: { id: "broken" } },
		]);

		expect(summary.saved).toEqual(["alpha"]);
		expect(summary.activated).toEqual([]);
		expect(summary.failed).toHaveLength(1);
		expect(summary.failed[0]?.path).toBe("b.json");
		expect(await strategies.getActiveStrategies()).toEqual([]);
	});

	it("activates only complete strategies", async () => {
		const strategies = new StrategyStore(new InMemoryStore());
		const summary = await importStrategies(
			strategies,
			[
				{ path: "a.json", contents: definition("alpha", true) },
				{ path: "b.json", contents: definition("entry-only", false) },
			],
			{ activate: true }
		);

		expect(summary.saved).toEqual(["alpha", "entry-only"]);
		expect(summary.activated).toEqual(["alpha"]);
		const active = await strategies.getActiveStrategies();
		expect(active.map((strategy) => strategy.id)).toEqual(["alpha"]);
	});
});
