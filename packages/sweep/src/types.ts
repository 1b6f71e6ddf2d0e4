import type {
	Candle,
	RawParameterGrid,
	SimulationSettings,
	SplitConfig,
} from "@backlab/core";
import type { SimulationResult } from "@backlab/backtest-core";
import type { IndicatorCacheStats } from "@backlab/indicators";
import type { RankedEntry, SimulationMetrics } from "@backlab/metrics";
import type {
	AnyStrategyVariant,
	StrategyId,
	StrategyParams,
} from "@backlab/strategy-engine";

/** `full` replays the unsplit bars. */
export type SweepSplit = "train" | "test" | "full";

export interface SweepStrategyInput {
	strategy: AnyStrategyVariant;
	grid: RawParameterGrid;
}

export interface SweepProgress {
	completed: number;
	total: number;
	strategyId: StrategyId;
	split: SweepSplit;
	paramsLabel: string;
}

export interface SweepInput {
	candles: readonly Candle[];
	strategies: readonly SweepStrategyInput[];
	settings: SimulationSettings;
	split?: SplitConfig;
	topN?: number;
	concurrency?: number;
	/** Checked before each run starts. */
	signal?: AbortSignal;
	onProgress?: (progress: SweepProgress) => void;
}

export interface PrunedCombination {
	strategyId: StrategyId;
	params: Readonly<StrategyParams>;
	reason: string;
}

export interface RankedReport {
	strategyId: StrategyId;
	strategyName: string;
	split: SweepSplit;
	totalRuns: number;
	/** Top N for train and test; every combination for `full`. */
	entries: RankedEntry<SimulationResult>[];
}

export interface StrategyComparisonRow {
	strategyId: StrategyId;
	strategyName: string;
	params: Readonly<StrategyParams>;
	paramsLabel: string;
	trainMetrics: SimulationMetrics;
	testMetrics: SimulationMetrics;
}

export interface OverfittingRow {
	strategyId: StrategyId;
	params: Readonly<StrategyParams>;
	paramsLabel: string;
	trainReturnPct: number;
	testReturnPct: number;
	/** Absolute difference in percentage points. */
	gapPct: number;
	overfit: boolean;
}

export interface SweepReport {
	reports: RankedReport[];
	comparison: StrategyComparisonRow[];
	overfitting: OverfittingRow[];
	runs: number;
	pruned: PrunedCombination[];
	cutoff: number;
	trainBars: number;
	testBars: number;
	fullBars: number;
	cacheStats: IndicatorCacheStats[];
}
