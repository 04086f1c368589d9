#!/usr/bin/env tsx
/**
 * Explains a strategy that never trades: for each rule, on how many days
 * its condition holds, instantly and under its declared modifier, plus the
 * combined entry and exit counts.
 *
 *   npm run diagnose:no-trades -- <spec.json> [dataDir]
 */

import path from "node:path";
import { findWorkspaceRoot, loadStrategySpecFile, tableLength } from "@ruleback/core";
import { CsvPriceHistorySource } from "@ruleback/data";
import { buildFeatureTable } from "@ruleback/indicators";
import { evaluateEntry, evaluateExit } from "@ruleback/strategy-engine";
import { countDays, formatRuleHits } from "./ruleHits";

const printLines = (lines: string[]): void => lines.forEach((line) => console.log(line));

const main = async (): Promise<void> => {
	const [specArg, dataDirArg] = process.argv.slice(2);
	if (!specArg) {
		console.log("Usage: npm run diagnose:no-trades -- <spec.json> [dataDir]");
		process.exitCode = 1;
		return;
	}
	const root = findWorkspaceRoot();
	const spec = loadStrategySpecFile(specArg, path.join(root, "configs"));
	const source = new CsvPriceHistorySource(path.resolve(root, dataDirArg ?? "data"));
	const bars = await source.loadDailyBars({
		ticker: spec.ticker,
		startDate: spec.startDate,
		endDate: spec.endDate,
	});
	const table = buildFeatureTable(bars, spec);

	console.log(`\n🔍 ${spec.ticker}: ${tableLength(table)} bars ${spec.startDate} → ${spec.endDate}\n`);
	console.log(`Entry rules (${spec.entrySequential ? "sequential" : "all at once"}):`);
	spec.entryRules.forEach((rule, idx) => printLines(formatRuleHits(`#${idx}`, rule, table, "entry")));
	console.log("Exit rules (first match wins):");
	spec.exitRules.forEach((rule, idx) => printLines(formatRuleHits(`#${idx}`, rule, table, "exit")));

	const entryDays = countDays(table, (day) => evaluateEntry(spec, day, table));
	const exitDays = countDays(table, (day) => evaluateExit(spec, day, table));
	console.log(`\nEntry condition holds on ${entryDays} days, exit condition on ${exitDays} days.`);
	if (entryDays === 0) {
		console.log("💡 No entry day: loosen the rule with the fewest days above, or drop a modifier.");
	}
};

main().catch((error: unknown) => {
	console.error(error instanceof Error ? error.message : error);
	process.exitCode = 1;
});
