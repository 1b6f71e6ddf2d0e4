import type { StrategyManifest, StrategyId } from "../../types";

export const RSI_REVERSAL_ID: StrategyId = "rsi_reversal";

export type RsiReversalParams = {
	period: number;
	oversold: number;
	overbought: number;
};

export const rsiReversalManifest: StrategyManifest = {
	strategyId: RSI_REVERSAL_ID,
	name: "RSI Reversal",
	description:
		"Buys when RSI drops below the oversold level, sells when it rises above the overbought level.",
};

export const RSI_REVERSAL_DEFAULT_GRID = {
	period: [7, 14, 21],
	oversold: [20, 25, 30],
	overbought: [70, 75, 80],
};
