import { ConfigError, type SignalDecision } from "@backlab/core";
import type { StrategyParams, StrategyVariant } from "../../types";
import { readPercentLevel, readPeriod } from "../../params";
import {
	RSI_REVERSAL_DEFAULT_GRID,
	RSI_REVERSAL_ID,
	rsiReversalManifest,
	type RsiReversalParams,
} from "./config";

export const rsiReversalStrategy: StrategyVariant<RsiReversalParams> = {
	id: RSI_REVERSAL_ID,
	manifest: rsiReversalManifest,
	defaultGrid: RSI_REVERSAL_DEFAULT_GRID,
	parseParams(raw: StrategyParams): RsiReversalParams {
		const params = {
			period: readPeriod(raw, "period"),
			oversold: readPercentLevel(raw, "oversold"),
			overbought: readPercentLevel(raw, "overbought"),
		};
		if (params.oversold >= params.overbought) {
			throw new ConfigError(
				`oversold (${params.oversold}) must be below overbought (${params.overbought})`,
				"params.oversold"
			);
		}
		return params;
	},
	viabilityIssue(): string | null {
		return null;
	},
	label(params: RsiReversalParams): string {
		return `RSI(${params.period}) ${params.oversold}/${params.overbought}`;
	},
	createSignal(params, indicators) {
		const rsi = indicators.rsi(params.period);
		return (ctx): SignalDecision => {
			const value = ctx.value(rsi);
			if (value === null) {
				return { signal: "HOLD", reason: "insufficient_data" };
			}
			if (value < params.oversold) {
				return { signal: "BUY", reason: "rsi_oversold" };
			}
			if (value > params.overbought) {
				return { signal: "SELL", reason: "rsi_overbought" };
			}
			return { signal: "HOLD", reason: "rsi_neutral" };
		};
	},
};

export * from "./config";
