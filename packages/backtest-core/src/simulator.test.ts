import { describe, expect, it } from "vitest";
import { createFeatureTable, type CrossoverRule } from "@ruleback/core";
import { evaluateEntry, evaluateExit } from "@ruleback/strategy-engine";
import { simulatePositions } from "./simulator";

const crossUp: CrossoverRule = {
	type: "crossover",
	fastWindow: 2,
	slowWindow: 5,
	direction: "above",
};
const crossDown: CrossoverRule = { ...crossUp, direction: "below" };
const spec = { entryRules: [crossUp], exitRules: [crossDown], entrySequential: false };

// fast crosses above slow at bar 4 and back below at bar 8
const table = createFeatureTable({
	close: [10, 10, 10, 10, 11, 12, 13, 12, 9, 9],
	columns: {
		ma_2: [1, 1, 1, 1, 3, 3, 3, 3, 1, 1],
		ma_5: [2, 2, 2, 2, 2, 2, 2, 2, 2, 2],
	},
});

describe("simulatePositions", () => {
	it("holds from the entry bar until the exit bar", () => {
		expect(simulatePositions(spec, table).position).toEqual([
			0, 0, 0, 0, 1, 1, 1, 1, 0, 0,
		]);
	});

	it("lags returns by one day", () => {
		const frame = simulatePositions(spec, table);
		expect(frame.strategyReturn[0]).toBe(0);
		expect(frame.strategyReturn[4]).toBe(0);
		expect(frame.strategyReturn[5]).toBeCloseTo(12 / 11 - 1, 12);
		expect(frame.strategyReturn[8]).toBeCloseTo(9 / 12 - 1, 12);
		expect(frame.strategyReturn[9]).toBe(0);
		expect(frame.equityCurve[9]).toBeCloseTo(9 / 11, 12);
	});

	it("aligns every column to the table", () => {
		const frame = simulatePositions(spec, table);
		expect(frame.dates).toEqual(table.dates);
		expect(frame.close).toEqual(table.close);
		expect(frame.equityCurve).toHaveLength(10);
	});

	it("returns an empty frame for an empty table", () => {
		const frame = simulatePositions(spec, createFeatureTable({ close: [] }));
		expect(frame.position).toEqual([]);
		expect(frame.equityCurve).toEqual([]);
	});

	it("is idempotent", () => {
		const first = JSON.stringify(simulatePositions(spec, table));
		expect(JSON.stringify(simulatePositions(spec, table))).toBe(first);
	});

	it("changes state only on a day its condition holds", () => {
		const wave = Array.from({ length: 60 }, (_, day) => Math.sin(day / 3));
		const drift = Array.from({ length: 60 }, (_, day) => Math.cos(day / 7) / 2);
		const noisy = createFeatureTable({
			close: wave.map((value) => 100 + value),
			columns: { ma_2: wave, ma_5: drift },
		});
		const { position } = simulatePositions(spec, noisy);
		expect(position.every((value) => value === 0 || value === 1)).toBe(true);
		for (let day = 1; day < position.length; day += 1) {
			if (position[day] === 1 && position[day - 1] === 0) {
				expect(evaluateEntry(spec, day, noisy)).toBe(true);
			}
			if (position[day] === 0 && position[day - 1] === 1) {
				expect(evaluateExit(spec, day, noisy)).toBe(true);
			}
		}
	});
});
