import {
	INSTANT,
	ruleMode,
	tableLength,
	type FeatureTable,
	type Rule,
} from "@ruleback/core";
import {
	describeRuleAt,
	evaluateRule,
	type TriggerSide,
} from "@ruleback/strategy-engine";

export const countDays = (
	table: FeatureTable,
	predicate: (day: number) => boolean
): number => {
	let count = 0;
	for (let day = 0; day < tableLength(table); day += 1) {
		if (predicate(day)) count += 1;
	}
	return count;
};

/** Two report lines per rule: its narration on the last bar, then its hit counts. */
export const formatRuleHits = (
	label: string,
	rule: Rule,
	table: FeatureTable,
	side: TriggerSide
): string[] => {
	const instant = countDays(table, (day) => evaluateRule(rule, day, table, INSTANT));
	const declared = countDays(table, (day) => evaluateRule(rule, day, table));
	const mode = ruleMode(rule);
	const modeLabel = mode.kind === "instant" ? "instant" : `${mode.kind} ${mode.days}d`;
	const lastDay = tableLength(table) - 1;
	return [
		`  ${label}: ${describeRuleAt(rule, lastDay, table, side)}`,
		`     holds on ${instant} days instantly, ${declared} days as declared (${modeLabel})`,
	];
};
