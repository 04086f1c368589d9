/**
 * Column-oriented, date-indexed table of daily bars plus the indicator
 * columns a specification needs. The core only ever reads it.
 */
export interface FeatureTable {
	readonly dates: readonly string[];
	readonly close: readonly number[];
	readonly returns: readonly number[];
	readonly columns: Readonly<Record<string, readonly number[]>>;
}

export interface FeatureTableInput {
	dates?: readonly string[];
	close: readonly number[];
	returns?: readonly number[];
	columns?: Record<string, readonly number[]>;
}

const SYNTHETIC_DATE_ORIGIN = Date.UTC(2000, 0, 3);

/** Close-to-close fractional change, first row zero. */
export const closeToCloseReturns = (close: readonly number[]): number[] =>
	close.map((value, idx) => {
		if (idx === 0) {
			return 0;
		}
		const previous = close[idx - 1];
		return previous ? value / previous - 1 : 0;
	});

const syntheticDates = (count: number): string[] =>
	Array.from({ length: count }, (_, idx) =>
		new Date(SYNTHETIC_DATE_ORIGIN + idx * 86_400_000).toISOString().slice(0, 10)
	);

/**
 * Assembles a frozen feature table. Missing `returns` are derived from
 * `close`; missing `dates` become consecutive calendar days from 2000-01-03.
 */
export const createFeatureTable = (input: FeatureTableInput): FeatureTable => {
	const length = input.close.length;
	const dates = input.dates ?? syntheticDates(length);
	const returns = input.returns ?? closeToCloseReturns(input.close);
	if (dates.length !== length || returns.length !== length) {
		throw new Error(
			`Feature table length mismatch: close=${length} dates=${dates.length} returns=${returns.length}`
		);
	}
	const columns: Record<string, readonly number[]> = {};
	for (const [name, values] of Object.entries(input.columns ?? {})) {
		if (values.length !== length) {
			throw new Error(
				`Feature column ${name} has ${values.length} rows, expected ${length}`
			);
		}
		columns[name] = Object.freeze([...values]);
	}
	return Object.freeze({
		dates: Object.freeze([...dates]),
		close: Object.freeze([...input.close]),
		returns: Object.freeze([...returns]),
		columns: Object.freeze(columns),
	});
};

export const tableLength = (table: FeatureTable): number => table.close.length;

export const hasColumn = (table: FeatureTable, column: string): boolean =>
	Object.prototype.hasOwnProperty.call(table.columns, column);

/** Value at a day, or null when absent, NaN or infinite. */
export const readCell = (
	table: FeatureTable,
	column: string,
	dayIndex: number
): number | null => {
	const series = table.columns[column];
	if (!series) {
		return null;
	}
	const value = series[dayIndex];
	return typeof value === "number" && Number.isFinite(value) ? value : null;
};
