import type { StrategyManifest, StrategyId } from "../../types";

export const MA_CROSSOVER_ID: StrategyId = "ma_crossover";

export type CrossoverParams = {
	shortPeriod: number;
	longPeriod: number;
};

export const maCrossoverManifest: StrategyManifest = {
	strategyId: MA_CROSSOVER_ID,
	name: "Moving Average Crossover",
	description:
		"Buys when the short SMA crosses above the long SMA, sells on the reverse cross.",
};

export const MA_CROSSOVER_DEFAULT_GRID = {
	shortPeriod: [5, 10, 15, 20, 25],
	longPeriod: [20, 30, 40, 50, 75, 100],
};
