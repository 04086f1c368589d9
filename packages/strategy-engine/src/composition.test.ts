import { describe, expect, it } from "vitest";
import {
	createFeatureTable,
	type CrossoverRule,
	type VolFilterRule,
} from "@ruleback/core";
import {
	evaluateAllRules,
	evaluateEntry,
	evaluateExit,
	findExitTrigger,
} from "./composition";

const table = createFeatureTable({
	close: [100, 100, 100, 100],
	columns: {
		ma_5: [1, 3, 3, 1],
		ma_20: [2, 2, 2, 2],
		rv_10: [0.1, 0.3, 0.1, 0.1],
		rv_10_med_252: [0.2, 0.2, 0.2, 0.2],
	},
});

const crossUp: CrossoverRule = {
	type: "crossover",
	fastWindow: 5,
	slowWindow: 20,
	direction: "above",
};
const crossDown: CrossoverRule = { ...crossUp, direction: "below" };
const calm: VolFilterRule = {
	type: "vol_filter",
	window: 10,
	threshold: "median_1y",
	relation: "below",
};
const stormy: VolFilterRule = { ...calm, relation: "above" };

describe("entry composition", () => {
	it("requires every entry rule on the same day", () => {
		const results = [0, 1, 2, 3].map((day) =>
			evaluateAllRules([crossUp, calm], day, table)
		);
		expect(results).toEqual([false, false, true, false]);
	});

	it("dispatches on the sequential flag", () => {
		const spec = { entryRules: [crossUp, { ...calm, lookaheadDays: 1 }] };
		expect(evaluateEntry({ ...spec, entrySequential: false }, 1, table)).toBe(
			true
		);
		expect(evaluateEntry({ ...spec, entrySequential: true }, 1, table)).toBe(
			true
		);
		expect(
			evaluateEntry({ entryRules: [crossUp, calm], entrySequential: false }, 1, table)
		).toBe(false);
	});
});

describe("exit composition", () => {
	it("reports the first firing rule in declared order", () => {
		expect(findExitTrigger([crossDown, calm], 0, table)).toBe(0);
		expect(findExitTrigger([calm, crossDown], 0, table)).toBe(0);
		expect(findExitTrigger([crossDown, stormy], 1, table)).toBe(1);
		expect(findExitTrigger([crossDown, stormy], 2, table)).toBeNull();
	});

	it("fires when any exit rule holds", () => {
		expect(evaluateExit({ exitRules: [crossDown, stormy] }, 1, table)).toBe(true);
		expect(evaluateExit({ exitRules: [crossDown, stormy] }, 2, table)).toBe(false);
		expect(evaluateExit({ exitRules: [] }, 0, table)).toBe(false);
	});
});
