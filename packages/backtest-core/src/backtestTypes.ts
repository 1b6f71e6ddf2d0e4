import type {
	Candle,
	DataSplit,
	SimulationSettings,
	Trade,
} from "@backlab/core";
import type { IndicatorProvider } from "@backlab/indicators";
import type {
	EquityPoint,
	RoundTrip,
	SimulationMetrics,
} from "@backlab/metrics";
import type { AccountSnapshot, OpenPositionReport } from "@backlab/risk-engine";
import type { BoundStrategy, StrategyId } from "@backlab/strategy-engine";

export interface SimulationInput {
	candles: readonly Candle[];
	strategy: BoundStrategy;
	settings: SimulationSettings;
	/** Shared cache for this bar range; a private one is built when omitted. */
	indicators?: IndicatorProvider;
	split?: DataSplit;
}

export interface SimulationResult {
	strategyId: StrategyId;
	strategyName: string;
	params: Readonly<Record<string, unknown>>;
	paramsLabel: string;
	split: DataSplit;
	trades: readonly Trade[];
	roundTrips: readonly RoundTrip[];
	finalState: AccountSnapshot;
	openPosition: OpenPositionReport | null;
	metrics: SimulationMetrics;
	equityCurve: readonly EquityPoint[];
	skippedEntries: number;
}
