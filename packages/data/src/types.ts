import type { Candle, MarketDataClient } from "@backlab/core";

export type { MarketDataClient };

export interface DataProviderLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	debug?: (event: string, payload?: Record<string, unknown>) => void;
}

export interface HistoricalFetchOptions {
	client: MarketDataClient;
	symbol: string;
	timeframe: string;
	startTimestamp: number;
	endTimestamp: number;
	batchSize?: number;
	maxIterations?: number;
	logger?: DataProviderLogger;
}

export interface CandleCacheOptions {
	client: MarketDataClient;
	symbol: string;
	timeframe: string;
	/** Length of the wanted window, in days, ending at `now`. */
	days: number;
	now: number;
	cachePath: string;
	useCache?: boolean;
	batchSize?: number;
	logger?: DataProviderLogger;
}

export interface CandleLoadResult {
	candles: Candle[];
	source: "cache" | "exchange";
}
