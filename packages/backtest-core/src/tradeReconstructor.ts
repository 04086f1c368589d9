import { tableLength, type FeatureTable } from "@ruleback/core";
import {
	buildTrigger,
	evaluateAllRules,
	explainingDay,
	findExitTrigger,
	locateSequentialTriggers,
	type RuleTrigger,
} from "@ruleback/strategy-engine";
import type { SimulationSpec } from "./simulator";

export const STILL_HOLDING_REASON = "End of backtest period (still holding)";

export interface Trade {
	entryIndex: number;
	entryDate: string;
	entryPrice: number;
	entryReason: string;
	entryTriggers: RuleTrigger[];
	exitIndex: number;
	exitDate: string;
	exitPrice: number;
	exitReason: string;
	/** Null when the trade was closed at the end of the data. */
	exitRuleIndex: number | null;
	pnlPct: number;
	stillOpen: boolean;
}

type OpenTrade = Pick<
	Trade,
	"entryIndex" | "entryDate" | "entryPrice" | "entryReason" | "entryTriggers"
>;

const pnlPct = (entryPrice: number, exitPrice: number): number =>
	(exitPrice / entryPrice - 1) * 100;

// Triggers for a day the entry condition holds on, or null if it does not.
const entryTriggersAt = (
	spec: SimulationSpec,
	day: number,
	table: FeatureTable
): RuleTrigger[] | null => {
	if (spec.entrySequential) {
		const firingDays = locateSequentialTriggers(spec.entryRules, day, table);
		if (!firingDays) {
			return null;
		}
		return spec.entryRules.map((rule, idx) =>
			buildTrigger(rule, idx, firingDays[idx], table, "entry", day)
		);
	}
	if (!evaluateAllRules(spec.entryRules, day, table)) {
		return null;
	}
	return spec.entryRules.map((rule, idx) =>
		buildTrigger(rule, idx, explainingDay(rule, day, table), table, "entry", day)
	);
};

/**
 * Rebuilds the trade ledger by replaying the same FLAT/LONG walk as the
 * simulator, attaching a reason to every entry and exit. A position still
 * open on the last bar is closed at its close.
 */
export const reconstructTrades = (
	spec: SimulationSpec,
	table: FeatureTable
): Trade[] => {
	const trades: Trade[] = [];
	let open: OpenTrade | null = null;

	for (let day = 0; day < tableLength(table); day += 1) {
		const price = table.close[day];
		if (open === null) {
			const triggers = entryTriggersAt(spec, day, table);
			if (triggers) {
				open = {
					entryIndex: day,
					entryDate: table.dates[day],
					entryPrice: price,
					entryReason: triggers.map((trigger) => trigger.reason).join(" | "),
					entryTriggers: triggers,
				};
			}
			continue;
		}
		const exitRuleIndex = findExitTrigger(spec.exitRules, day, table);
		if (exitRuleIndex === null) {
			continue;
		}
		const trigger = buildTrigger(
			spec.exitRules[exitRuleIndex],
			exitRuleIndex,
			day,
			table,
			"exit",
			day
		);
		trades.push({
			...open,
			exitIndex: day,
			exitDate: table.dates[day],
			exitPrice: price,
			exitReason: trigger.reason,
			exitRuleIndex,
			pnlPct: pnlPct(open.entryPrice, price),
			stillOpen: false,
		});
		open = null;
	}

	if (open !== null) {
		const last = tableLength(table) - 1;
		trades.push({
			...open,
			exitIndex: last,
			exitDate: table.dates[last],
			exitPrice: table.close[last],
			exitReason: STILL_HOLDING_REASON,
			exitRuleIndex: null,
			pnlPct: pnlPct(open.entryPrice, table.close[last]),
			stillOpen: true,
		});
	}
	return trades;
};

