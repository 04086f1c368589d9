import fs from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import {
	DataUnavailableError,
	describeError,
	normalizeIsoDate,
	silentLogger,
	type ModuleLogger,
	type PriceBar,
} from "@ruleback/core";
import type {
	DailyBarsRequest,
	DataSourceOptions,
	PriceHistorySource,
} from "./types";

const blankToUndefined = (value: unknown): unknown =>
	value === "" ? undefined : value;
const requiredNumber = z.preprocess(blankToUndefined, z.coerce.number().finite());
const optionalNumber = z.preprocess(
	blankToUndefined,
	z.coerce.number().finite().optional()
);

const csvRowSchema = z.object({
	date: z
		.string()
		.transform(normalizeIsoDate)
		.refine((value): value is string => value !== null, "expected a YYYY-MM-DD date"),
	close: requiredNumber,
	open: optionalNumber,
	high: optionalNumber,
	low: optionalNumber,
	volume: optionalNumber,
});

const csvRowsSchema = z.array(z.record(z.string()));

// Header names are matched case-insensitively; "Adj Close" style columns are ignored.
const normalizeHeader = (header: string[]): string[] =>
	header.map((name) => name.trim().toLowerCase());

/**
 * Parses daily price CSV text with a header holding at least `date` and
 * `close`. Missing `open`/`high`/`low` fall back to the close, a missing
 * volume to zero. Rows come back sorted by date with duplicates dropped.
 */
export const parsePriceCsv = (text: string, label = "csv"): PriceBar[] => {
	const records = csvRowsSchema.parse(
		parse(text, {
			columns: normalizeHeader,
			skip_empty_lines: true,
			trim: true,
		})
	);
	const byDate = new Map<string, PriceBar>();
	records.forEach((record, idx) => {
		const parsed = csvRowSchema.safeParse(record);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw new DataUnavailableError(
				`${label} row ${idx + 2}: ${issue.path.join(".") || "row"} ${issue.message}`
			);
		}
		const row = parsed.data;
		if (!byDate.has(row.date)) {
			byDate.set(row.date, {
				date: row.date,
				open: row.open ?? row.close,
				high: row.high ?? row.close,
				low: row.low ?? row.close,
				close: row.close,
				volume: row.volume ?? 0,
			});
		}
	});
	return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
};

/** Reads `<dataDir>/<TICKER>.csv`. */
export class CsvPriceHistorySource implements PriceHistorySource {
	readonly name = "csv";
	private readonly logger: ModuleLogger;

	constructor(
		private readonly dataDir: string,
		options: DataSourceOptions = {}
	) {
		this.logger = options.logger ?? silentLogger;
	}

	/** Pair tickers drop their separator: `BTC/USDT` reads `BTCUSDT.csv`. */
	filePath(ticker: string): string {
		const fileName = ticker.toUpperCase().replace(/[\\/]/g, "");
		return path.join(this.dataDir, `${fileName}.csv`);
	}

	async loadDailyBars(request: DailyBarsRequest): Promise<PriceBar[]> {
		const file = this.filePath(request.ticker);
		let text: string;
		try {
			text = await fs.readFile(file, "utf8");
		} catch (error) {
			throw new DataUnavailableError(
				`No price file for ${request.ticker} at ${file}: ${describeError(error)}`,
				request.ticker
			);
		}
		const bars = parsePriceCsv(text, path.basename(file)).filter(
			(bar) => bar.date >= request.startDate && bar.date < request.endDate
		);
		this.logger.info("daily_bars_loaded", {
			source: this.name,
			ticker: request.ticker,
			file,
			bars: bars.length,
		});
		return bars;
	}
}
