import {
	tableLength,
	type FeatureTable,
	type PositionValue,
	type StrategySpecification,
} from "@ruleback/core";
import { evaluateEntry, evaluateExit } from "@ruleback/strategy-engine";

/** Per-day output aligned to the feature table's rows. */
export interface SimulationFrame {
	dates: string[];
	close: number[];
	returns: number[];
	position: PositionValue[];
	strategyReturn: number[];
	equityCurve: number[];
}

export type SimulationSpec = Pick<
	StrategySpecification,
	"entryRules" | "exitRules" | "entrySequential"
>;

/**
 * FLAT/LONG state for every day. An entry is only checked while flat and an
 * exit only while long, so a day never both opens and closes a position.
 */
export const walkPositions = (
	spec: SimulationSpec,
	table: FeatureTable
): PositionValue[] => {
	const positions: PositionValue[] = [];
	let position: PositionValue = 0;
	for (let day = 0; day < tableLength(table); day += 1) {
		if (position === 0 && evaluateEntry(spec, day, table)) {
			position = 1;
		} else if (position === 1 && evaluateExit(spec, day, table)) {
			position = 0;
		}
		positions.push(position);
	}
	return positions;
};

/**
 * Runs the position state machine over the table. Returns are close to
 * close with a one-day lag: the position held at yesterday's close earns
 * today's return.
 */
export const simulatePositions = (
	spec: SimulationSpec,
	table: FeatureTable
): SimulationFrame => {
	const position = walkPositions(spec, table);
	const strategyReturn = position.map((_, day) =>
		day === 0 ? 0 : position[day - 1] * table.returns[day]
	);
	const equityCurve: number[] = [];
	let equity = 1;
	for (const value of strategyReturn) {
		equity *= 1 + value;
		equityCurve.push(equity);
	}
	return {
		dates: [...table.dates],
		close: [...table.close],
		returns: [...table.returns],
		position,
		strategyReturn,
		equityCurve,
	};
};
