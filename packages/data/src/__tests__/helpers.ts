import type { Candle } from "@backlab/core";
import type { MarketDataClient } from "../types";

export const buildCandles = (
	count: number,
	start: number,
	stepMs: number,
	timeframe = "1m"
): Candle[] =>
	Array.from({ length: count }, (_, idx) => ({
		symbol: "BTC/USDT",
		timeframe,
		timestamp: start + idx * stepMs,
		open: 100 + idx,
		high: 101 + idx,
		low: 99 + idx,
		close: 100 + idx,
		volume: 1_000 + idx,
	}));

/** Serves bars at or after `since`, optionally re-sending some already served. */
export class StaticMarketDataClient implements MarketDataClient {
	calls = 0;

	constructor(
		private readonly candles: Candle[],
		private readonly overlapMs = 0
	) {}

	async fetchOHLCV(
		symbol: string,
		_timeframe: string,
		limit = 500,
		since = 0
	): Promise<Candle[]> {
		this.calls += 1;
		return this.candles
			.filter(
				(candle) =>
					candle.symbol === symbol && candle.timestamp >= since - this.overlapMs
			)
			.slice(0, limit);
	}
}
