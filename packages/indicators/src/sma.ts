import type { IndicatorSeries } from "@backlab/core";
import { assertPeriod, windowMean } from "./validation";

/**
 * Simple moving average aligned to the input. Accepts indicator series as
 * input, so a window touching a warm-up `null` stays `null`.
 */
export function smaSeries(
	values: ReadonlyArray<number | null>,
	period: number
): IndicatorSeries {
	assertPeriod(period);
	const series: Array<number | null> = new Array(values.length);
	for (let i = 0; i < values.length; i += 1) {
		series[i] = windowMean(values, i, period);
	}
	return series;
}

export function sma(values: readonly number[], period: number): number | null {
	assertPeriod(period);
	if (values.length < period) {
		return null;
	}
	return windowMean(values, values.length - 1, period);
}
