export * from "./types";
export { DAILY_TIMEFRAME, candleToPriceBar, fetchDailyCandles } from "./historical";
export type { DailyFetchOptions } from "./historical";
export { CsvPriceHistorySource, parsePriceCsv } from "./csvSource";
export { MarketDataPriceHistorySource } from "./marketDataSource";
export type { MarketDataSourceOptions } from "./marketDataSource";
export {
	CcxtMarketDataClient,
	SUPPORTED_EXCHANGES,
	createCcxtMarketDataClient,
} from "./ccxtClient";
export { mapCcxtCandleToCandle } from "./utils/ccxtMapper";
