import {
	TRADING_DAYS_PER_YEAR,
	allRules,
	type Rule,
	type StrategySpecification,
} from "@ruleback/core";
import { toValidationResult, type ValidationResult } from "./types";

export const MESSAGES = {
	dateOrder: "Start date must be before end date.",
	noEntryRules: "At least one entry rule is required.",
	noExitRules: "At least one exit rule is required.",
	noMetrics: "No metrics specified; default metrics will be used.",
	nonPositiveMa: "Moving average windows must be positive integers.",
	equalMa: "Fast and slow moving averages must differ.",
	smallMa:
		"Very small moving average windows (under 5 days) may be unstable or overly reactive.",
	largeMa:
		"Very large moving average windows (over 200 days) may make the strategy slow and unresponsive.",
	shortVolWindow: "Volatility window must be greater than 1.",
	longVolWindow:
		"Very large volatility windows may dilute signal responsiveness.",
	bothModifiers:
		"A rule cannot declare both duration_days and lookahead_days.",
	crossoverContradiction:
		"Entry rules require the same moving averages to be both above and below each other, which is impossible.",
	volContradiction:
		"Entry rules require volatility to be both above and below the same threshold, which is impossible.",
} as const;

const SMALL_MA_WINDOW = 5;
const LARGE_MA_WINDOW = 200;
const MAX_VOL_WINDOW = TRADING_DAYS_PER_YEAR * 5;

const checkRule = (rule: Rule, errors: string[], warnings: string[]): void => {
	if (rule.durationDays !== undefined && rule.lookaheadDays !== undefined) {
		errors.push(MESSAGES.bothModifiers);
	}
	if (rule.type === "crossover") {
		const { fastWindow, slowWindow } = rule;
		if (fastWindow <= 0 || slowWindow <= 0) {
			errors.push(MESSAGES.nonPositiveMa);
		}
		if (fastWindow === slowWindow) {
			errors.push(MESSAGES.equalMa);
		}
		if (fastWindow < SMALL_MA_WINDOW || slowWindow < SMALL_MA_WINDOW) {
			warnings.push(MESSAGES.smallMa);
		}
		if (fastWindow > LARGE_MA_WINDOW || slowWindow > LARGE_MA_WINDOW) {
			warnings.push(MESSAGES.largeMa);
		}
		return;
	}
	if (rule.window <= 1) {
		errors.push(MESSAGES.shortVolWindow);
	}
	if (rule.window > MAX_VOL_WINDOW) {
		warnings.push(MESSAGES.longVolWindow);
	}
};

// Comparison key an AND of entry rules cannot require in both directions.
const contradictionKey = (rule: Rule): string =>
	rule.type === "crossover"
		? `crossover:${rule.fastWindow}:${rule.slowWindow}`
		: `vol_filter:${rule.window}:${rule.threshold}`;

const findContradictions = (entryRules: readonly Rule[]): string[] => {
	const sides = new Map<string, { rule: Rule; seen: Set<string> }>();
	for (const rule of entryRules) {
		const key = contradictionKey(rule);
		const entry = sides.get(key) ?? { rule, seen: new Set<string>() };
		entry.seen.add(rule.type === "crossover" ? rule.direction : rule.relation);
		sides.set(key, entry);
	}
	const errors: string[] = [];
	for (const { rule, seen } of sides.values()) {
		if (seen.has("above") && seen.has("below")) {
			errors.push(
				rule.type === "crossover"
					? MESSAGES.crossoverContradiction
					: MESSAGES.volContradiction
			);
		}
	}
	return errors;
};

/**
 * Checks a parsed specification without looking at any data. Errors block
 * the backtest; warnings are advisory.
 */
export const validateSpec = (spec: StrategySpecification): ValidationResult => {
	const errors: string[] = [];
	const warnings: string[] = [];

	if (spec.startDate >= spec.endDate) {
		errors.push(MESSAGES.dateOrder);
	}
	if (spec.entryRules.length === 0) {
		errors.push(MESSAGES.noEntryRules);
	}
	if (spec.exitRules.length === 0) {
		errors.push(MESSAGES.noExitRules);
	}
	if (spec.metrics.length === 0) {
		warnings.push(MESSAGES.noMetrics);
	}
	for (const rule of allRules(spec)) {
		checkRule(rule, errors, warnings);
	}
	errors.push(...findContradictions(spec.entryRules));

	return toValidationResult(errors, warnings);
};
