import type { FeatureTable, Rule, StrategySpecification } from "@ruleback/core";
import { evaluateRule } from "./ruleEvaluator";
import { evaluateSequentialEntry } from "./sequential";

/** Every rule must hold on the day; stops at the first failure. */
export const evaluateAllRules = (
	rules: readonly Rule[],
	dayIndex: number,
	table: FeatureTable
): boolean => rules.every((rule) => evaluateRule(rule, dayIndex, table));

export const evaluateEntry = (
	spec: Pick<StrategySpecification, "entryRules" | "entrySequential">,
	dayIndex: number,
	table: FeatureTable
): boolean =>
	spec.entrySequential
		? evaluateSequentialEntry(spec.entryRules, dayIndex, table)
		: evaluateAllRules(spec.entryRules, dayIndex, table);

/**
 * Index of the first exit rule, in declared order, that holds on the day.
 * Later rules are not evaluated once one fires, so the index doubles as
 * the tie-break for the exit reason.
 */
export const findExitTrigger = (
	exitRules: readonly Rule[],
	dayIndex: number,
	table: FeatureTable
): number | null => {
	for (let idx = 0; idx < exitRules.length; idx += 1) {
		if (evaluateRule(exitRules[idx], dayIndex, table)) {
			return idx;
		}
	}
	return null;
};

export const evaluateExit = (
	spec: Pick<StrategySpecification, "exitRules">,
	dayIndex: number,
	table: FeatureTable
): boolean => findExitTrigger(spec.exitRules, dayIndex, table) !== null;
