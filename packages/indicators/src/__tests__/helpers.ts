import type { Candle } from "@backlab/core";

export const buildCandles = (
	closes: readonly number[],
	options: { start?: number; stepMs?: number; spread?: number } = {}
): Candle[] => {
	const start = options.start ?? 0;
	const stepMs = options.stepMs ?? 60_000;
	const spread = options.spread ?? 0;
	return closes.map((close, index) => ({
		symbol: "BTC/USDT",
		timeframe: "1m",
		timestamp: start + index * stepMs,
		open: close,
		high: close + spread,
		low: close - spread,
		close,
		volume: 1,
	}));
};
