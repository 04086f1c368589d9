import {
	DAY_MS,
	silentLogger,
	timestampToIsoDate,
	type ModuleLogger,
	type PriceBar,
} from "@ruleback/core";
import type { Candle, MarketDataClient } from "./types";

export const DAILY_TIMEFRAME = "1d";

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 1_000;

export interface DailyFetchOptions {
	client: MarketDataClient;
	symbol: string;
	startTimestamp: number;
	/** Exclusive. */
	endTimestamp: number;
	batchSize?: number;
	maxIterations?: number;
	logger?: ModuleLogger;
}

/**
 * Pages daily candles from `startTimestamp` until `endTimestamp` or until
 * the client runs dry. Repeated timestamps across pages are dropped.
 */
export const fetchDailyCandles = async (
	options: DailyFetchOptions
): Promise<Candle[]> => {
	const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const maxIterations = Math.max(
		options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		1
	);
	const logger = options.logger ?? silentLogger;

	const result: Candle[] = [];
	const seenTimestamps = new Set<number>();
	let since = Math.max(0, options.startTimestamp);
	let iterations = 0;

	while (since < options.endTimestamp && iterations < maxIterations) {
		const batch = await options.client.fetchOHLCV(
			options.symbol,
			DAILY_TIMEFRAME,
			batchSize,
			since
		);
		iterations += 1;

		if (!batch.length) {
			break;
		}

		for (const candle of batch) {
			if (candle.timestamp >= options.endTimestamp) {
				return result;
			}
			if (
				candle.timestamp >= options.startTimestamp &&
				!seenTimestamps.has(candle.timestamp)
			) {
				result.push(candle);
				seenTimestamps.add(candle.timestamp);
			}
		}

		const last = batch[batch.length - 1];
		since = Math.max(last.timestamp + DAY_MS, since + DAY_MS);
	}

	if (iterations >= maxIterations) {
		logger.warn("daily_fetch_iterations_exceeded", {
			symbol: options.symbol,
			startTimestamp: options.startTimestamp,
			endTimestamp: options.endTimestamp,
			iterations,
			maxIterations,
		});
	}

	return result;
};

export const candleToPriceBar = (candle: Candle): PriceBar => ({
	date: timestampToIsoDate(candle.timestamp),
	open: candle.open,
	high: candle.high,
	low: candle.low,
	close: candle.close,
	volume: candle.volume,
});
