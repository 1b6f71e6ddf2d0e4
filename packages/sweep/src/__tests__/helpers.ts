import type { Candle } from "@backlab/core";
import type { SimulationResult } from "@backlab/backtest-core";
import type { SimulationMetrics } from "@backlab/metrics";

export const buildCandles = (closes: readonly number[], stepMs = 3_600_000): Candle[] =>
	closes.map((close, index) => ({
		symbol: "BTC/USDT",
		timeframe: "1h",
		timestamp: index * stepMs,
		open: close,
		high: close + 1,
		low: close - 1,
		close,
		volume: 1,
	}));

/** Rises, falls and rises again so crossovers happen on both windows. */
export const wavyCloses = (length: number): number[] =>
	Array.from({ length }, (_, index) => 100 + Math.round(10 * Math.sin(index / 3)));

const emptyMetrics: SimulationMetrics = {
	returnPct: 0,
	realizedReturnPct: 0,
	winRate: 0,
	tradeCount: 0,
	maxDrawdown: 0,
	maxDrawdownPct: 0,
	grossProfit: 0,
	grossLoss: 0,
	profitFactor: 0,
	netProfit: 0,
	finalEquity: 500,
	unrealizedPnl: 0,
	stopLossCount: 0,
	avgTradeReturnPct: 0,
};

export const fakeResult = (
	params: Record<string, unknown>,
	split: "train" | "test",
	returnPct: number,
	tradeCount = 1
): SimulationResult => ({
	strategyId: "ma_crossover",
	strategyName: "Moving Average Crossover",
	params,
	paramsLabel: JSON.stringify(params),
	split,
	trades: [],
	roundTrips: [],
	finalState: { cash: 500, assetBalance: 0, equity: 500 },
	openPosition: null,
	metrics: { ...emptyMetrics, returnPct, tradeCount },
	equityCurve: [],
	skippedEntries: 0,
});
