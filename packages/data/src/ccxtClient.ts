import ccxt from "ccxt";
import type { Exchange } from "ccxt";
import type { Candle, MarketDataClient } from "./types";
import { mapCcxtCandleToCandle } from "./utils/ccxtMapper";

const EXCHANGE_FACTORIES: Record<string, () => Exchange> = {
	binance: () => new ccxt.binance({ enableRateLimit: true, options: { defaultType: "spot" } }),
	coinbase: () => new ccxt.coinbase({ enableRateLimit: true }),
	kraken: () => new ccxt.kraken({ enableRateLimit: true }),
	mexc: () => new ccxt.mexc({ enableRateLimit: true, options: { defaultType: "spot" } }),
};

export const SUPPORTED_EXCHANGES = Object.keys(EXCHANGE_FACTORIES);

/** Public market data only; no credentials are read. */
export class CcxtMarketDataClient implements MarketDataClient {
	constructor(private readonly exchange: Exchange) {}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 500,
		since?: number
	): Promise<Candle[]> {
		const rows = await this.exchange.fetchOHLCV(symbol, timeframe, since, limit);
		return rows.map((row) => mapCcxtCandleToCandle(row, symbol, timeframe));
	}
}

export const createCcxtMarketDataClient = (exchangeId: string): CcxtMarketDataClient => {
	const factory = EXCHANGE_FACTORIES[exchangeId.toLowerCase()];
	if (!factory) {
		throw new Error(
			`Unsupported exchange "${exchangeId}". Expected one of: ${SUPPORTED_EXCHANGES.join(", ")}`
		);
	}
	return new CcxtMarketDataClient(factory());
};
