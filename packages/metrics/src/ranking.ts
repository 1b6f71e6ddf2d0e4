import { DEFAULT_TOP_N, assertPositiveInteger } from "@backlab/core";
import type { SimulationMetrics } from "./metricsSchema";

export interface RankableResult {
	metrics: Pick<SimulationMetrics, "returnPct" | "tradeCount">;
}

export interface RankedEntry<T extends RankableResult> {
	rank: number;
	result: T;
}

/**
 * Orders results by return (descending), then by fewer round trips, then by
 * input order, and keeps the first `topN`.
 */
export const rankResults = <T extends RankableResult>(
	results: readonly T[],
	topN = DEFAULT_TOP_N
): RankedEntry<T>[] => {
	assertPositiveInteger(topN, "topN");
	return results
		.map((result, index) => ({ result, index }))
		.sort(
			(a, b) =>
				b.result.metrics.returnPct - a.result.metrics.returnPct ||
				a.result.metrics.tradeCount - b.result.metrics.tradeCount ||
				a.index - b.index
		)
		.slice(0, topN)
		.map(({ result }, position) => ({ rank: position + 1, result }));
};
