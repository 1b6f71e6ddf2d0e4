import ccxt from "ccxt";
import type { Exchange } from "ccxt";
import { ConfigError, type Candle } from "@backlab/core";
import type { MarketDataClient } from "./types";
import { mapCcxtCandleToCandle } from "./utils/ccxtMapper";

const DEFAULT_LIMIT = 500;

type ExchangeFactory = () => Exchange;

/** Public market data only: no credentials are ever passed. */
const EXCHANGES: Record<string, ExchangeFactory> = {
	binance: () => new ccxt.binance({ enableRateLimit: true }),
	mexc: () => new ccxt.mexc({ enableRateLimit: true }),
	bybit: () => new ccxt.bybit({ enableRateLimit: true }),
	kraken: () => new ccxt.kraken({ enableRateLimit: true }),
	okx: () => new ccxt.okx({ enableRateLimit: true }),
};

export const supportedExchanges = (): string[] => Object.keys(EXCHANGES);

export class CcxtMarketDataClient implements MarketDataClient {
	private constructor(
		private readonly exchange: Exchange,
		readonly exchangeId: string
	) {}

	static create(exchangeId: string): CcxtMarketDataClient {
		const factory = EXCHANGES[exchangeId];
		if (!factory) {
			throw new ConfigError(
				`unsupported exchange "${exchangeId}" (supported: ${supportedExchanges().join(", ")})`,
				"market.exchange"
			);
		}
		return new CcxtMarketDataClient(factory(), exchangeId);
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = DEFAULT_LIMIT,
		since?: number
	): Promise<Candle[]> {
		const rows = await this.exchange.fetchOHLCV(symbol, timeframe, since, limit);
		return rows.map((row) => mapCcxtCandleToCandle(row, symbol, timeframe));
	}
}
