import type { OHLCV } from "ccxt";
import type { Candle } from "@backlab/core";

/** Maps one ccxt OHLCV row onto a Candle; missing fields read as 0. */
export const mapCcxtCandleToCandle = (
	row: OHLCV,
	symbol: string,
	timeframe: string
): Candle => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		symbol,
		timeframe,
		timestamp: Number(timestamp ?? 0),
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
	};
};
