import type { StrategyManifest, StrategyId } from "../../types";

export const TREND_FILTERED_CROSSOVER_ID: StrategyId = "trend_filtered_crossover";

export type AtrTrendFilter = {
	mode: "atr";
	atrPeriod: number;
	averagePeriod: number;
	multiplier: number;
};

export type AdxTrendFilter = {
	mode: "adx";
	adxPeriod: number;
	threshold: number;
};

export type HigherTimeframeTrendFilter = {
	mode: "higher_timeframe";
	timeframe: string;
	shortPeriod: number;
	longPeriod: number;
};

export type TrendFilter = AtrTrendFilter | AdxTrendFilter | HigherTimeframeTrendFilter;

export type TrendFilterMode = TrendFilter["mode"];

export type TrendFilteredCrossoverParams = {
	shortPeriod: number;
	longPeriod: number;
	filter: TrendFilter;
};

export const trendFilteredCrossoverManifest: StrategyManifest = {
	strategyId: TREND_FILTERED_CROSSOVER_ID,
	name: "Trend-Filtered Crossover",
	description:
		"Moving average crossover whose entries require a trend filter (ATR expansion, ADX strength or higher-timeframe alignment). Exits are not filtered.",
};

export const TREND_FILTERED_CROSSOVER_DEFAULT_GRID = {
	shortPeriod: [20],
	longPeriod: [50],
	filter: [
		{ mode: "atr", atrPeriod: [14, 20], averagePeriod: [20], multiplier: [1.0, 1.2, 1.5] },
		{ mode: "adx", adxPeriod: [14, 20], threshold: [20, 25, 30] },
		{
			mode: "higher_timeframe",
			timeframe: ["4h", "1d"],
			shortPeriod: [10, 20],
			longPeriod: [20, 50],
		},
	],
};
