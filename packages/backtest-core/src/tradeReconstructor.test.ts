import { describe, expect, it } from "vitest";
import {
	createFeatureTable,
	type CrossoverRule,
	type VolFilterRule,
} from "@ruleback/core";
import { simulatePositions } from "./simulator";
import { STILL_HOLDING_REASON, reconstructTrades } from "./tradeReconstructor";

const crossUp: CrossoverRule = {
	type: "crossover",
	fastWindow: 2,
	slowWindow: 5,
	direction: "above",
};
const crossDown: CrossoverRule = { ...crossUp, direction: "below" };
const spec = { entryRules: [crossUp], exitRules: [crossDown], entrySequential: false };

const table = createFeatureTable({
	dates: [
		"2024-01-01",
		"2024-01-02",
		"2024-01-03",
		"2024-01-04",
		"2024-01-05",
		"2024-01-08",
		"2024-01-09",
		"2024-01-10",
		"2024-01-11",
		"2024-01-12",
	],
	close: [10, 10, 10, 10, 11, 12, 13, 12, 9, 9],
	columns: {
		ma_2: [1, 1, 1, 1, 3, 3, 3, 3, 1, 1],
		ma_5: [2, 2, 2, 2, 2, 2, 2, 2, 2, 2],
	},
});

describe("reconstructTrades", () => {
	it("records one trade for a single cross up and back", () => {
		const trades = reconstructTrades(spec, table);
		expect(trades).toHaveLength(1);
		const [trade] = trades;
		expect(trade.entryIndex).toBe(4);
		expect(trade.entryDate).toBe("2024-01-05");
		expect(trade.entryPrice).toBe(11);
		expect(trade.entryReason).toBe(
			"Entry: 2-day MA (3.00) crossed above 5-day MA (2.00)"
		);
		expect(trade.exitIndex).toBe(8);
		expect(trade.exitDate).toBe("2024-01-11");
		expect(trade.exitPrice).toBe(9);
		expect(trade.exitReason).toBe(
			"Exit: 2-day MA (1.00) crossed below 5-day MA (2.00)"
		);
		expect(trade.exitRuleIndex).toBe(0);
		expect(trade.pnlPct).toBeCloseTo((9 / 11 - 1) * 100, 10);
		expect(trade.stillOpen).toBe(false);
	});

	it("closes a trade still open at the last bar", () => {
		const trades = reconstructTrades(
			{ ...spec, exitRules: [{ ...crossDown, fastWindow: 3 }] },
			table
		);
		expect(trades).toHaveLength(1);
		expect(trades[0].exitIndex).toBe(9);
		expect(trades[0].exitPrice).toBe(9);
		expect(trades[0].exitReason).toBe(STILL_HOLDING_REASON);
		expect(trades[0].exitRuleIndex).toBeNull();
		expect(trades[0].stillOpen).toBe(true);
	});

	it("picks the first firing exit rule for the reason", () => {
		const calm: VolFilterRule = {
			type: "vol_filter",
			window: 10,
			threshold: "median_1y",
			relation: "below",
		};
		const withVol = createFeatureTable({
			dates: table.dates,
			close: table.close,
			columns: {
				...table.columns,
				rv_10: [0.3, 0.3, 0.3, 0.3, 0.3, 0.3, 0.3, 0.3, 0.1, 0.1],
				rv_10_med_252: Array.from({ length: 10 }, () => 0.2),
			},
		});
		const [trade] = reconstructTrades(
			{ ...spec, exitRules: [calm, crossDown] },
			withVol
		);
		expect(trade.exitRuleIndex).toBe(0);
		expect(trade.exitReason).toBe(
			"Exit: 10-day RV (10.00%) below 1Y median (20.00%)"
		);
	});

	it("returns an empty ledger for an empty table", () => {
		expect(reconstructTrades(spec, createFeatureTable({ close: [] }))).toEqual([]);
	});

	it("agrees with the simulator on every transition", () => {
		const wave = Array.from({ length: 80 }, (_, day) => Math.sin(day / 4));
		const noisy = createFeatureTable({
			close: wave.map((value) => 50 + value),
			columns: { ma_2: wave, ma_5: Array.from({ length: 80 }, () => 0.2) },
		});
		const { position } = simulatePositions(spec, noisy);
		const entries = position.flatMap((value, day) =>
			value === 1 && (day === 0 || position[day - 1] === 0) ? [day] : []
		);
		const exits = position.flatMap((value, day) =>
			value === 0 && day > 0 && position[day - 1] === 1 ? [day] : []
		);
		const trades = reconstructTrades(spec, noisy);
		expect(trades.map((trade) => trade.entryIndex)).toEqual(entries);
		expect(
			trades.filter((trade) => !trade.stillOpen).map((trade) => trade.exitIndex)
		).toEqual(exits);
	});

	it("is idempotent", () => {
		const first = JSON.stringify(reconstructTrades(spec, table));
		expect(JSON.stringify(reconstructTrades(spec, table))).toBe(first);
	});
});

describe("sequential entry reasons", () => {
	const calmWithin3: VolFilterRule = {
		type: "vol_filter",
		window: 10,
		threshold: "median_1y",
		relation: "below",
		lookaheadDays: 3,
	};
	const sequential = createFeatureTable({
		close: [10, 10, 10, 10, 10, 11, 12, 13, 14, 15],
		columns: {
			ma_2: [1, 1, 1, 1, 1, 3, 3, 3, 3, 3],
			ma_5: Array.from({ length: 10 }, () => 2),
			rv_10: [0.3, 0.3, 0.3, 0.3, 0.3, 0.3, 0.3, 0.1, 0.3, 0.3],
			rv_10_med_252: Array.from({ length: 10 }, () => 0.2),
		},
	});

	it("enters on the anchor day and explains the lagging rule at its firing day", () => {
		const [trade] = reconstructTrades(
			{
				entryRules: [crossUp, calmWithin3],
				exitRules: [crossDown],
				entrySequential: true,
			},
			sequential
		);
		expect(trade.entryIndex).toBe(5);
		expect(trade.entryPrice).toBe(11);
		expect(trade.entryTriggers.map((trigger) => trigger.dayIndex)).toEqual([5, 7]);
		expect(trade.entryTriggers[1].reason).toBe(
			`Entry: 10-day RV (10.00%) below 1Y median (20.00%) (fired ${sequential.dates[7]})`
		);
		expect(trade.entryReason).toBe(
			`Entry: 2-day MA (3.00) crossed above 5-day MA (2.00) | ${trade.entryTriggers[1].reason}`
		);
	});
});
