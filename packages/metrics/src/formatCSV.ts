import type { SimulationFrame, Trade } from "@ruleback/backtest-core";

export interface FormatCsvOptions {
	includeHeader?: boolean;
}

const TRADE_CSV_COLUMNS = [
	"entry_date",
	"entry_price",
	"entry_reason",
	"exit_date",
	"exit_price",
	"exit_reason",
	"pnl_pct",
	"still_open",
] as const;

const FRAME_CSV_COLUMNS = [
	"date",
	"close",
	"return",
	"position",
	"strategy_return",
	"equity_curve",
] as const;

type CsvRow<C extends string> = Record<C, unknown>;

export const formatTradesCsv = (
	trades: readonly Trade[],
	options: FormatCsvOptions = {}
): string =>
	toCsv(
		TRADE_CSV_COLUMNS,
		trades.map((trade) => ({
			entry_date: trade.entryDate,
			entry_price: trade.entryPrice,
			entry_reason: trade.entryReason,
			exit_date: trade.exitDate,
			exit_price: trade.exitPrice,
			exit_reason: trade.exitReason,
			pnl_pct: trade.pnlPct,
			still_open: trade.stillOpen,
		})),
		options.includeHeader ?? true
	);

export const formatFrameCsv = (
	frame: SimulationFrame,
	options: FormatCsvOptions = {}
): string =>
	toCsv(
		FRAME_CSV_COLUMNS,
		frame.dates.map((date, day) => ({
			date,
			close: frame.close[day],
			return: frame.returns[day],
			position: frame.position[day],
			strategy_return: frame.strategyReturn[day],
			equity_curve: frame.equityCurve[day],
		})),
		options.includeHeader ?? true
	);

// The header comes from the column list, so an empty table still has one.
const toCsv = <C extends string>(
	columns: readonly C[],
	rows: CsvRow<C>[],
	includeHeader: boolean
): string => {
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(columns.join(","));
	}
	for (const row of rows) {
		lines.push(columns.map((column) => formatValue(row[column])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (/[",\n]/.test(value)) {
			return `"${value.replace(/"/g, '""')}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
