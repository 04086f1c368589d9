import type { FeatureTable, Rule } from "@ruleback/core";
import { evaluateInstant, findFiringDay } from "./ruleEvaluator";

/**
 * Day on which each rule of a sequential entry is satisfied relative to
 * `anchorDay`, or null when the sequence does not hold there.
 *
 * - the first rule must hold on the anchor day itself; any modifiers it
 *   declares are ignored for this check;
 * - a later rule without `lookaheadDays` must also hold on the anchor day;
 * - a later rule with `lookaheadDays = L` must hold on some day in
 *   `[anchorDay, anchorDay + L]`, and the earliest such day is reported.
 *
 * `durationDays` on later rules is not consulted: each check is instant.
 */
export const locateSequentialTriggers = (
	rules: readonly Rule[],
	anchorDay: number,
	table: FeatureTable
): number[] | null => {
	const [first, ...rest] = rules;
	if (!first || !evaluateInstant(first, anchorDay, table)) {
		return null;
	}
	const days: number[] = [anchorDay];
	for (const rule of rest) {
		if (rule.lookaheadDays === undefined) {
			if (!evaluateInstant(rule, anchorDay, table)) {
				return null;
			}
			days.push(anchorDay);
			continue;
		}
		const firing = findFiringDay(rule, anchorDay, rule.lookaheadDays, table);
		if (firing === null) {
			return null;
		}
		days.push(firing);
	}
	return days;
};

/**
 * "First A, then B within N days". The entry is attributed to `anchorDay`
 * even when a lagging rule only fires on a later day.
 */
export const evaluateSequentialEntry = (
	rules: readonly Rule[],
	anchorDay: number,
	table: FeatureTable
): boolean => locateSequentialTriggers(rules, anchorDay, table) !== null;
