import type {
	Candle,
	IndicatorSeries,
	RawParameterGrid,
	SignalDecision,
} from "@backlab/core";
import type { IndicatorProvider } from "@backlab/indicators";

export type StrategyId =
	| "ma_crossover"
	| "rsi_reversal"
	| "trend_filtered_crossover";

export type StrategyParams = Record<string, unknown>;

/**
 * What a signal function may see on bar `index`. `value` reads an indicator
 * series relative to the current bar and returns null for any index after it.
 */
export interface SignalContext {
	readonly index: number;
	readonly candle: Candle;
	value(series: IndicatorSeries, offset?: number): number | null;
}

export type SignalFn = (ctx: SignalContext) => SignalDecision;

export interface StrategyManifest {
	strategyId: StrategyId;
	name: string;
	description: string;
}

export interface StrategyVariant<TParams extends StrategyParams> {
	readonly id: StrategyId;
	readonly manifest: StrategyManifest;
	readonly defaultGrid: RawParameterGrid;
	/** Reads and range-checks raw parameters. Throws ConfigError. */
	parseParams(raw: StrategyParams): TParams;
	/**
	 * Combinations that parse but can never trade sensibly (short window not
	 * shorter than long). Returns the problem, or null when viable.
	 */
	viabilityIssue(params: TParams): string | null;
	label(params: TParams): string;
	createSignal(params: TParams, indicators: IndicatorProvider): SignalFn;
}

export type AnyStrategyVariant = StrategyVariant<StrategyParams>;

/** A variant with one validated parameter set, ready to simulate. */
export interface BoundStrategy {
	readonly id: StrategyId;
	readonly name: string;
	readonly params: Readonly<StrategyParams>;
	readonly label: string;
	createSignal(indicators: IndicatorProvider): SignalFn;
}
