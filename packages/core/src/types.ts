export * from "./time";

/** One daily bar of raw price history, keyed by its ISO calendar date. */
export interface PriceBar {
	date: string;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/** Position column value: 0 when flat, 1 when fully invested. */
export type PositionValue = 0 | 1;
