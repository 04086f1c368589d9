import { TRADING_DAYS_PER_YEAR } from "@ruleback/core";

const finiteWindow = (
	values: readonly number[],
	end: number,
	window: number
): number[] => {
	const start = Math.max(0, end - window + 1);
	const slice: number[] = [];
	for (let i = start; i <= end; i += 1) {
		const value = values[i];
		if (Number.isFinite(value)) {
			slice.push(value);
		}
	}
	return slice;
};

export const sampleStdDev = (values: readonly number[]): number => {
	if (values.length < 2) {
		return Number.NaN;
	}
	const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
	const variance =
		values.reduce((sum, value) => sum + (value - mean) ** 2, 0) /
		(values.length - 1);
	return Math.sqrt(variance);
};

export const median = (values: readonly number[]): number => {
	if (!values.length) {
		return Number.NaN;
	}
	const sorted = [...values].sort((a, b) => a - b);
	const mid = Math.floor(sorted.length / 2);
	return sorted.length % 2 === 1
		? sorted[mid]
		: (sorted[mid - 1] + sorted[mid]) / 2;
};

/** Trailing sample standard deviation; NaN until two observations exist. */
export const rollingStdDev = (
	values: readonly number[],
	window: number
): number[] => values.map((_, idx) => sampleStdDev(finiteWindow(values, idx, window)));

/** Trailing median over non-missing observations, minimum one. */
export const rollingMedian = (
	values: readonly number[],
	window: number
): number[] => values.map((_, idx) => median(finiteWindow(values, idx, window)));

/** Standard deviation of daily returns over `window` days, annualised. */
export const realizedVolatility = (
	returns: readonly number[],
	window: number
): number[] => {
	const scale = Math.sqrt(TRADING_DAYS_PER_YEAR);
	return rollingStdDev(returns, window).map((value) => value * scale);
};
