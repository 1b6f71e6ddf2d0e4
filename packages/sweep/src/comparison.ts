import { DEFAULT_TOP_N, stableStringify } from "@backlab/core";
import type { SimulationResult } from "@backlab/backtest-core";
import { rankResults } from "@backlab/metrics";
import type { OverfittingRow, StrategyComparisonRow } from "./types";

export const DEFAULT_OVERFIT_THRESHOLD_PCT = 10;

export interface VariantResults {
	train: readonly SimulationResult[];
	test: readonly SimulationResult[];
}

export interface OverfittingOptions {
	topN?: number;
	thresholdPct?: number;
}

const indexByParams = (
	results: readonly SimulationResult[]
): Map<string, SimulationResult> => {
	const index = new Map<string, SimulationResult>();
	for (const result of results) {
		const key = stableStringify(result.params);
		if (!index.has(key)) {
			index.set(key, result);
		}
	}
	return index;
};

/**
 * One row per variant: the combination with the best test return (fewer
 * trades on a tie) next to its train run.
 */
export const compareStrategies = (
	variants: readonly VariantResults[]
): StrategyComparisonRow[] => {
	const rows: StrategyComparisonRow[] = [];
	for (const { train, test } of variants) {
		const [best] = rankResults(test, 1);
		if (!best) {
			continue;
		}
		const trainRun = indexByParams(train).get(stableStringify(best.result.params));
		if (!trainRun) {
			continue;
		}
		rows.push({
			strategyId: best.result.strategyId,
			strategyName: best.result.strategyName,
			params: best.result.params,
			paramsLabel: best.result.paramsLabel,
			trainMetrics: trainRun.metrics,
			testMetrics: best.result.metrics,
		});
	}
	return rows;
};

/**
 * Replays the top train combinations on the test window. A gap above the
 * threshold (percentage points) is flagged.
 */
export const checkOverfitting = (
	train: readonly SimulationResult[],
	test: readonly SimulationResult[],
	options: OverfittingOptions = {}
): OverfittingRow[] => {
	const thresholdPct = options.thresholdPct ?? DEFAULT_OVERFIT_THRESHOLD_PCT;
	const testByParams = indexByParams(test);
	const rows: OverfittingRow[] = [];
	for (const { result } of rankResults(train, options.topN ?? DEFAULT_TOP_N)) {
		const testRun = testByParams.get(stableStringify(result.params));
		if (!testRun) {
			continue;
		}
		const gapPct = Math.abs(result.metrics.returnPct - testRun.metrics.returnPct);
		rows.push({
			strategyId: result.strategyId,
			params: result.params,
			paramsLabel: result.paramsLabel,
			trainReturnPct: result.metrics.returnPct,
			testReturnPct: testRun.metrics.returnPct,
			gapPct,
			overfit: gapPct > thresholdPct,
		});
	}
	return rows;
};
