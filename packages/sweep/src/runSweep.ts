import {
	ConfigError,
	DEFAULT_CONCURRENCY,
	DEFAULT_TOP_N,
	assertPositiveInteger,
	createLogger,
	isConfigError,
	stableStringify,
	validateSimulationSettings,
	type Candle,
} from "@backlab/core";
import { runSimulation, type SimulationResult } from "@backlab/backtest-core";
import { IndicatorCache } from "@backlab/indicators";
import { rankResults } from "@backlab/metrics";
import {
	bindParsedStrategy,
	type AnyStrategyVariant,
	type BoundStrategy,
	type StrategyParams,
} from "@backlab/strategy-engine";
import { checkOverfitting, compareStrategies } from "./comparison";
import { expandRawGrid } from "./grid";
import { resolveSplitCutoff, splitByTimestamp } from "./split";
import { runTaskPool, type PoolTask } from "./taskPool";
import type {
	OverfittingRow,
	PrunedCombination,
	RankedReport,
	SweepInput,
	SweepReport,
	SweepSplit,
} from "./types";

const logger = createLogger("sweep");

const SPLITS: readonly SweepSplit[] = ["train", "test", "full"];

interface PreparedVariant {
	variant: AnyStrategyVariant;
	bound: BoundStrategy[];
}

interface RunMeta {
	variantIndex: number;
	split: SweepSplit;
	strategy: BoundStrategy;
}

const parseCombination = (
	variant: AnyStrategyVariant,
	combination: StrategyParams,
	field: string
): StrategyParams => {
	try {
		return variant.parseParams(combination);
	} catch (error) {
		if (isConfigError(error)) {
			throw new ConfigError(error.message, field);
		}
		throw error;
	}
};

const prepareVariant = (
	variant: AnyStrategyVariant,
	grid: SweepInput["strategies"][number]["grid"],
	field: string,
	pruned: PrunedCombination[]
): PreparedVariant => {
	const seen = new Set<string>();
	const bound: BoundStrategy[] = [];
	for (const combination of expandRawGrid(grid, `${field}.grid`)) {
		const params = parseCombination(variant, combination, field);
		const key = stableStringify(params);
		if (seen.has(key)) {
			continue;
		}
		seen.add(key);
		const issue = variant.viabilityIssue(params);
		if (issue) {
			pruned.push({ strategyId: variant.id, params, reason: issue });
			logger.debug("combination_pruned", {
				strategyId: variant.id,
				params,
				reason: issue,
			});
			continue;
		}
		bound.push(bindParsedStrategy(variant, params));
	}
	if (!bound.length) {
		throw new ConfigError(
			`every combination for ${variant.id} was pruned as non-viable`,
			`${field}.grid`
		);
	}
	return { variant, bound };
};

/**
 * Sweeps every strategy grid over a train window, a test window and the full
 * unsplit range. All configuration is validated before the first run; runs go
 * through a bounded task pool and are ranked once every run has finished.
 */
export const runSweep = async (input: SweepInput): Promise<SweepReport> => {
	const topN = input.topN ?? DEFAULT_TOP_N;
	const concurrency = input.concurrency ?? DEFAULT_CONCURRENCY;
	assertPositiveInteger(topN, "topN");
	assertPositiveInteger(concurrency, "concurrency");
	validateSimulationSettings(input.settings);
	if (!input.candles.length) {
		throw new ConfigError("no candles to sweep", "candles");
	}
	if (!input.strategies.length) {
		throw new ConfigError("must list at least one strategy", "strategies");
	}

	const pruned: PrunedCombination[] = [];
	const seenIds = new Set<string>();
	const prepared = input.strategies.map(({ strategy, grid }, index) => {
		const field = `strategies[${index}]`;
		if (seenIds.has(strategy.id)) {
			throw new ConfigError(`duplicate strategy id "${strategy.id}"`, field);
		}
		seenIds.add(strategy.id);
		return prepareVariant(strategy, grid, field, pruned);
	});

	const cutoff = resolveSplitCutoff(input.candles, input.split);
	const { train, test } = splitByTimestamp(input.candles, cutoff);
	const windows: Record<SweepSplit, { candles: readonly Candle[]; cache: IndicatorCache }> = {
		train: { candles: train, cache: new IndicatorCache(train) },
		test: { candles: test, cache: new IndicatorCache(test) },
		full: { candles: input.candles, cache: new IndicatorCache(input.candles) },
	};

	const meta: RunMeta[] = [];
	prepared.forEach(({ bound }, variantIndex) => {
		for (const strategy of bound) {
			for (const split of SPLITS) {
				meta.push({ variantIndex, split, strategy });
			}
		}
	});
	const tasks: PoolTask<SimulationResult>[] = meta.map(({ split, strategy }) => () =>
		runSimulation({
			candles: windows[split].candles,
			strategy,
			settings: input.settings,
			indicators: windows[split].cache,
			split,
		})
	);

	logger.info("sweep_started", {
		strategies: prepared.map(({ variant }) => variant.id),
		runs: tasks.length,
		pruned: pruned.length,
		cutoff,
		trainBars: train.length,
		testBars: test.length,
		fullBars: input.candles.length,
		concurrency,
	});

	const results = await runTaskPool(tasks, {
		concurrency,
		signal: input.signal,
		onResult: (result, index, completed) => {
			const progress = {
				completed,
				total: tasks.length,
				strategyId: result.strategyId,
				split: meta[index].split,
				paramsLabel: result.paramsLabel,
			};
			logger.debug("sweep_progress", { ...progress });
			input.onProgress?.(progress);
		},
	});

	const grouped = prepared.map(
		(): Record<SweepSplit, SimulationResult[]> => ({ train: [], test: [], full: [] })
	);
	results.forEach((result, index) => {
		const { variantIndex, split } = meta[index];
		grouped[variantIndex][split].push(result);
	});

	const reports: RankedReport[] = [];
	const overfitting: OverfittingRow[] = [];
	prepared.forEach(({ variant }, variantIndex) => {
		for (const split of SPLITS) {
			const runs = grouped[variantIndex][split];
			reports.push({
				strategyId: variant.id,
				strategyName: variant.manifest.name,
				split,
				totalRuns: runs.length,
				entries: rankResults(runs, split === "full" ? runs.length : topN),
			});
		}
		overfitting.push(
			...checkOverfitting(grouped[variantIndex].train, grouped[variantIndex].test, {
				topN,
			})
		);
	});

	const cacheStats = SPLITS.map((split) => windows[split].cache.stats());
	logger.debug("indicator_cache_stats", { caches: cacheStats });
	logger.info("sweep_finished", {
		runs: results.length,
		reports: reports.length,
		overfitFlags: overfitting.filter((row) => row.overfit).length,
	});

	return {
		reports,
		comparison: compareStrategies(grouped),
		overfitting,
		runs: results.length,
		pruned,
		cutoff,
		trainBars: train.length,
		testBars: test.length,
		fullBars: input.candles.length,
		cacheStats,
	};
};
