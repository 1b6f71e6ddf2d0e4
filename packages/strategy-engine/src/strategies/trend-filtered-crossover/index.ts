import type { StrategyParams, StrategyVariant } from "../../types";
import { readPeriod, readRecord } from "../../params";
import { crossoverWindowIssue, evaluateCrossover } from "../ma-crossover/crossoverLogic";
import {
	TREND_FILTERED_CROSSOVER_DEFAULT_GRID,
	TREND_FILTERED_CROSSOVER_ID,
	trendFilteredCrossoverManifest,
	type TrendFilteredCrossoverParams,
} from "./config";
import { createTrendPredicate, describeTrendFilter, parseTrendFilter } from "./filters";

export const trendFilteredCrossoverStrategy: StrategyVariant<TrendFilteredCrossoverParams> =
	{
		id: TREND_FILTERED_CROSSOVER_ID,
		manifest: trendFilteredCrossoverManifest,
		defaultGrid: TREND_FILTERED_CROSSOVER_DEFAULT_GRID,
		parseParams(raw: StrategyParams): TrendFilteredCrossoverParams {
			return {
				shortPeriod: readPeriod(raw, "shortPeriod"),
				longPeriod: readPeriod(raw, "longPeriod"),
				filter: parseTrendFilter(readRecord(raw, "filter")),
			};
		},
		viabilityIssue(params: TrendFilteredCrossoverParams): string | null {
			const base = crossoverWindowIssue(params.shortPeriod, params.longPeriod);
			if (base) {
				return base;
			}
			if (params.filter.mode === "higher_timeframe") {
				const issue = crossoverWindowIssue(
					params.filter.shortPeriod,
					params.filter.longPeriod
				);
				return issue ? `filter ${issue}` : null;
			}
			return null;
		},
		label(params: TrendFilteredCrossoverParams): string {
			return `SMA(${params.shortPeriod}/${params.longPeriod}) + ${describeTrendFilter(
				params.filter
			)}`;
		},
		createSignal(params, indicators) {
			const shortSeries = indicators.sma(params.shortPeriod);
			const longSeries = indicators.sma(params.longPeriod);
			const trendConfirmed = createTrendPredicate(params.filter, indicators);
			return (ctx) => {
				const decision = evaluateCrossover(ctx, shortSeries, longSeries);
				if (decision.signal === "BUY" && !trendConfirmed(ctx)) {
					return { signal: "HOLD", reason: "trend_not_confirmed" };
				}
				return decision;
			};
		},
	};

export * from "./config";
export { createTrendPredicate, describeTrendFilter, parseTrendFilter } from "./filters";
