import type { StrategyParams, StrategyVariant } from "../../types";
import { readPeriod } from "../../params";
import {
	MA_CROSSOVER_DEFAULT_GRID,
	MA_CROSSOVER_ID,
	maCrossoverManifest,
	type CrossoverParams,
} from "./config";
import { evaluateCrossover, crossoverWindowIssue } from "./crossoverLogic";

export const maCrossoverStrategy: StrategyVariant<CrossoverParams> = {
	id: MA_CROSSOVER_ID,
	manifest: maCrossoverManifest,
	defaultGrid: MA_CROSSOVER_DEFAULT_GRID,
	parseParams(raw: StrategyParams): CrossoverParams {
		return {
			shortPeriod: readPeriod(raw, "shortPeriod"),
			longPeriod: readPeriod(raw, "longPeriod"),
		};
	},
	viabilityIssue(params: CrossoverParams): string | null {
		return crossoverWindowIssue(params.shortPeriod, params.longPeriod);
	},
	label(params: CrossoverParams): string {
		return `SMA(${params.shortPeriod}/${params.longPeriod})`;
	},
	createSignal(params, indicators) {
		const shortSeries = indicators.sma(params.shortPeriod);
		const longSeries = indicators.sma(params.longPeriod);
		return (ctx) => evaluateCrossover(ctx, shortSeries, longSeries);
	},
};

export * from "./config";
export { evaluateCrossover } from "./crossoverLogic";
