import type { ModuleLogger, PriceBar } from "@ruleback/core";

/** One OHLCV candle as exchanges report it, keyed by its open time in ms. */
export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/**
 * Read-only market data access. Candles come back in chronological order,
 * starting at `since` when given.
 */
export interface MarketDataClient {
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<Candle[]>;
}

export interface DailyBarsRequest {
	ticker: string;
	/** Inclusive ISO date. */
	startDate: string;
	/** Exclusive ISO date. */
	endDate: string;
}

/** Anything that can hand the backtester a ticker's daily price history. */
export interface PriceHistorySource {
	readonly name: string;
	loadDailyBars(request: DailyBarsRequest): Promise<PriceBar[]>;
}

export interface DataSourceOptions {
	logger?: ModuleLogger;
}
