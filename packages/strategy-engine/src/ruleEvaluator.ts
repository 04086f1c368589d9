import {
	columnsForRule,
	readCell,
	ruleMode,
	tableLength,
	type EvaluationMode,
	type FeatureTable,
	type Rule,
} from "@ruleback/core";

export interface RuleValues {
	left: number;
	right: number;
}

/**
 * The two values a rule compares on a day: fast/slow MA for a crossover,
 * realized volatility/its median for a vol filter. Null when either is
 * missing or the table lacks the column.
 */
export const readRuleValues = (
	rule: Rule,
	dayIndex: number,
	table: FeatureTable
): RuleValues | null => {
	const [leftColumn, rightColumn] = columnsForRule(rule);
	const left = readCell(table, leftColumn, dayIndex);
	const right = readCell(table, rightColumn, dayIndex);
	if (left === null || right === null) {
		return null;
	}
	return { left, right };
};

const compare = (rule: Rule, values: RuleValues): boolean => {
	const side = rule.type === "crossover" ? rule.direction : rule.relation;
	return side === "above"
		? values.left > values.right
		: values.left < values.right;
};

/** Missing data and out-of-range days are false. */
export const evaluateInstant = (
	rule: Rule,
	dayIndex: number,
	table: FeatureTable
): boolean => {
	if (dayIndex < 0 || dayIndex >= tableLength(table)) {
		return false;
	}
	const values = readRuleValues(rule, dayIndex, table);
	return values !== null && compare(rule, values);
};

// Fails closed: a window running off the start of history, or any missing
// day inside it, is false.
const evaluateDuration = (
	rule: Rule,
	dayIndex: number,
	days: number,
	table: FeatureTable
): boolean => {
	if (days <= 0 || dayIndex - days + 1 < 0) {
		return false;
	}
	for (let idx = dayIndex - days + 1; idx <= dayIndex; idx += 1) {
		if (!evaluateInstant(rule, idx, table)) {
			return false;
		}
	}
	return true;
};

/**
 * First day in `[fromIndex, fromIndex + days]` on which the rule's instant
 * condition holds. Days past the end of history and days with missing data
 * are skipped rather than failing the search.
 */
export const findFiringDay = (
	rule: Rule,
	fromIndex: number,
	days: number,
	table: FeatureTable
): number | null => {
	const last = Math.min(fromIndex + days, tableLength(table) - 1);
	for (let idx = Math.max(fromIndex, 0); idx <= last; idx += 1) {
		if (evaluateInstant(rule, idx, table)) {
			return idx;
		}
	}
	return null;
};

/**
 * Whether `rule` holds at `dayIndex` under `mode`. The mode defaults to the
 * one the rule declares; pass `INSTANT` to check the exact day only.
 * Never mutates the rule.
 */
export const evaluateRule = (
	rule: Rule,
	dayIndex: number,
	table: FeatureTable,
	mode: EvaluationMode = ruleMode(rule)
): boolean => {
	switch (mode.kind) {
		case "instant":
			return evaluateInstant(rule, dayIndex, table);
		case "duration":
			return evaluateDuration(rule, dayIndex, mode.days, table);
		case "lookahead":
			return findFiringDay(rule, dayIndex, mode.days, table) !== null;
	}
};
