import { ruleMode, type FeatureTable, type Rule } from "@ruleback/core";
import { findFiringDay, readRuleValues } from "./ruleEvaluator";

export type TriggerSide = "entry" | "exit";

export interface RuleTrigger {
	ruleIndex: number;
	dayIndex: number;
	date: string;
	reason: string;
}

const formatPrice = (value: number | undefined): string =>
	value === undefined ? "n/a" : value.toFixed(2);

const formatPercent = (value: number | undefined): string =>
	value === undefined ? "n/a" : `${(value * 100).toFixed(2)}%`;

/**
 * One-line narration of a rule using the values it compared on `dayIndex`.
 * When the day differs from `evaluationDay` the firing date is appended.
 */
export const describeRuleAt = (
	rule: Rule,
	dayIndex: number,
	table: FeatureTable,
	side: TriggerSide,
	evaluationDay: number = dayIndex
): string => {
	const values = readRuleValues(rule, dayIndex, table);
	const action = side === "entry" ? "Entry" : "Exit";
	const text =
		rule.type === "crossover"
			? `${action}: ${rule.fastWindow}-day MA (${formatPrice(values?.left)}) crossed ${rule.direction} ${rule.slowWindow}-day MA (${formatPrice(values?.right)})`
			: `${action}: ${rule.window}-day RV (${formatPercent(values?.left)}) ${rule.relation} 1Y median (${formatPercent(values?.right)})`;
	if (dayIndex === evaluationDay) {
		return text;
	}
	return `${text} (fired ${table.dates[dayIndex] ?? `day ${dayIndex}`})`;
};

/**
 * Day whose values explain why a rule held at `evaluationDay` under its
 * declared mode: the firing day inside a lookahead window, otherwise the
 * evaluation day itself.
 */
export const explainingDay = (
	rule: Rule,
	evaluationDay: number,
	table: FeatureTable
): number => {
	const mode = ruleMode(rule);
	if (mode.kind !== "lookahead") {
		return evaluationDay;
	}
	return findFiringDay(rule, evaluationDay, mode.days, table) ?? evaluationDay;
};

export const buildTrigger = (
	rule: Rule,
	ruleIndex: number,
	dayIndex: number,
	table: FeatureTable,
	side: TriggerSide,
	evaluationDay: number
): RuleTrigger => ({
	ruleIndex,
	dayIndex,
	date: table.dates[dayIndex] ?? "",
	reason: describeRuleAt(rule, dayIndex, table, side, evaluationDay),
});
