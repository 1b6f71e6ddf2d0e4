export * from "./time";

export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/**
 * Indicator values aligned to candle indices. `null` marks indices where the
 * indicator is not defined yet (warm-up) or cannot be rated (flat market).
 */
export type IndicatorSeries = ReadonlyArray<number | null>;

export type TradeSignal = "BUY" | "SELL" | "HOLD";

export interface SignalDecision {
	signal: TradeSignal;
	reason: string;
}

export type TradeAction = "BUY" | "SELL";

export type TradeReason = "signal" | "stop_loss";

export interface Trade {
	timestamp: number;
	action: TradeAction;
	price: number;
	quantity: number;
	fee: number;
	/** Cash moved by the trade: amount spent on a BUY, net proceeds of a SELL. */
	value: number;
	cashBalance: number;
	assetBalance: number;
	reason: TradeReason;
	signalReason: string;
}

/**
 * Capital and risk knobs shared by every simulated run. Percent fields are
 * fractions: `positionSizePercent: 0.35` spends 35% of cash per entry.
 */
export interface SimulationSettings {
	startingCapital: number;
	feeRate: number;
	positionSizePercent: number;
	minTradeUnit: number;
	stopLossPercent: number;
}

export const DEFAULT_SIMULATION_SETTINGS: SimulationSettings = {
	startingCapital: 500,
	feeRate: 0.001,
	positionSizePercent: 0.35,
	minTradeUnit: 0.0001,
	stopLossPercent: 0.1,
};

export type DataSplit = "train" | "test" | "full";
