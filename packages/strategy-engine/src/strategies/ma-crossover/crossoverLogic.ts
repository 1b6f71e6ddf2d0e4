import type { IndicatorSeries, SignalDecision } from "@backlab/core";
import type { SignalContext } from "../../types";

/**
 * Golden cross: short was at or below long on the previous bar and is above
 * it now. Dead cross is the mirror image.
 */
export const evaluateCrossover = (
	ctx: SignalContext,
	shortSeries: IndicatorSeries,
	longSeries: IndicatorSeries
): SignalDecision => {
	const short = ctx.value(shortSeries);
	const long = ctx.value(longSeries);
	const prevShort = ctx.value(shortSeries, 1);
	const prevLong = ctx.value(longSeries, 1);
	if (short === null || long === null || prevShort === null || prevLong === null) {
		return { signal: "HOLD", reason: "insufficient_data" };
	}
	if (prevShort <= prevLong && short > long) {
		return { signal: "BUY", reason: "golden_cross" };
	}
	if (prevShort >= prevLong && short < long) {
		return { signal: "SELL", reason: "dead_cross" };
	}
	return { signal: "HOLD", reason: "no_cross" };
};

export const crossoverWindowIssue = (short: number, long: number): string | null =>
	short < long
		? null
		: `shortPeriod (${short}) must be less than longPeriod (${long})`;
