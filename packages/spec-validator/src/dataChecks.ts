import {
	VOL_MEDIAN_WINDOW,
	allRules,
	hasColumn,
	requiredColumns,
	tableLength,
	type FeatureTable,
	type StrategySpecification,
} from "@ruleback/core";
import { evaluateEntry, evaluateExit } from "@ruleback/strategy-engine";
import { toValidationResult, type ValidationResult } from "./types";

export const DATA_MESSAGES = {
	noData: "No price data is available for the requested period.",
	noEntries:
		"Given the historical data and rules, this strategy is unlikely to generate any entries. It may produce zero trades.",
	neverExits:
		"Entry conditions can occur, but exit conditions never trigger on this data. Positions may never close once opened.",
} as const;

const HISTORY_MARGIN = 10;

export const missingColumnMessage = (column: string): string =>
	`Feature table has no "${column}" column, but a strategy rule reads it.`;

export const shortHistoryMessage = (required: number, available: number): string =>
	`Strategy uses long lookback windows (up to ${required} days) but only ${available} data points are available. Early signal values may be unreliable.`;

/** Columns the rules read that the table does not carry, first-seen order. */
export const findMissingColumns = (
	spec: StrategySpecification,
	table: FeatureTable
): string[] => requiredColumns(spec).filter((column) => !hasColumn(table, column));

/**
 * History the largest window in use needs before signals settle: moving
 * averages and modifiers want a small margin, volatility also needs a year
 * for its median. Zero when no rule looks back.
 */
export const requiredHistoryLength = (spec: StrategySpecification): number => {
	let required = 0;
	for (const rule of allRules(spec)) {
		if (rule.type === "crossover") {
			required = Math.max(
				required,
				Math.max(rule.fastWindow, rule.slowWindow) + HISTORY_MARGIN
			);
		} else {
			required = Math.max(required, rule.window + VOL_MEDIAN_WINDOW);
		}
		if (rule.lookaheadDays) {
			required = Math.max(required, rule.lookaheadDays + HISTORY_MARGIN);
		}
		if (rule.durationDays) {
			required = Math.max(required, rule.durationDays + HISTORY_MARGIN);
		}
	}
	return required;
};

/**
 * Checks the specification against the prepared table: that there is data
 * and every column a rule reads, that history covers the longest window,
 * and, by a dry run of the rules, that entries and exits can happen at all.
 */
export const validateWithData = (
	spec: StrategySpecification,
	table: FeatureTable
): ValidationResult => {
	const days = tableLength(table);
	if (days === 0) {
		return toValidationResult([DATA_MESSAGES.noData], []);
	}

	const errors = findMissingColumns(spec, table).map(missingColumnMessage);
	const warnings: string[] = [];

	const required = requiredHistoryLength(spec);
	if (required > 0 && days < required) {
		warnings.push(shortHistoryMessage(required, days));
	}

	let anyEntry = false;
	let anyExit = false;
	for (let day = 0; day < days && !(anyEntry && anyExit); day += 1) {
		anyEntry = anyEntry || evaluateEntry(spec, day, table);
		anyExit = anyExit || evaluateExit(spec, day, table);
	}
	if (!anyEntry) {
		warnings.push(DATA_MESSAGES.noEntries);
	} else if (!anyExit) {
		warnings.push(DATA_MESSAGES.neverExits);
	}

	return toValidationResult(errors, warnings);
};
