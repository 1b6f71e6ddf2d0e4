import type { Candle } from "../types";

/**
 * Read-only source of historical OHLCV bars. The sweep itself never talks to
 * one; the data package and the CLI do.
 */
export interface MarketDataClient {
	/**
	 * Fetch OHLCV candles for a symbol and timeframe in chronological order.
	 * @param limit - Maximum number of candles per request
	 * @param since - Timestamp (ms) of the first candle wanted
	 */
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<Candle[]>;
}
