import {
	isoDateToTimestamp,
	silentLogger,
	type ModuleLogger,
	type PriceBar,
} from "@ruleback/core";
import { candleToPriceBar, fetchDailyCandles } from "./historical";
import type {
	DailyBarsRequest,
	DataSourceOptions,
	MarketDataClient,
	PriceHistorySource,
} from "./types";

export interface MarketDataSourceOptions extends DataSourceOptions {
	batchSize?: number;
	maxIterations?: number;
}

/** Daily bars paged from an exchange-style market data client. */
export class MarketDataPriceHistorySource implements PriceHistorySource {
	readonly name = "market-data";
	private readonly logger: ModuleLogger;

	constructor(
		private readonly client: MarketDataClient,
		private readonly options: MarketDataSourceOptions = {}
	) {
		this.logger = options.logger ?? silentLogger;
	}

	async loadDailyBars(request: DailyBarsRequest): Promise<PriceBar[]> {
		const candles = await fetchDailyCandles({
			client: this.client,
			symbol: request.ticker,
			startTimestamp: isoDateToTimestamp(request.startDate),
			endTimestamp: isoDateToTimestamp(request.endDate),
			batchSize: this.options.batchSize,
			maxIterations: this.options.maxIterations,
			logger: this.logger,
		});
		this.logger.info("daily_bars_loaded", {
			source: this.name,
			ticker: request.ticker,
			bars: candles.length,
		});
		return candles.map(candleToPriceBar);
	}
}
