import type { IndicatorSeries } from "@backlab/core";
import { assertPeriod, windowMean } from "./validation";

export interface PriceBar {
	high: number;
	low: number;
	close: number;
}

/** True range per bar; the first bar has no previous close and uses high - low. */
export function trueRangeSeries(bars: readonly PriceBar[]): number[] {
	const ranges: number[] = new Array(bars.length);
	for (let i = 0; i < bars.length; i += 1) {
		const current = bars[i];
		const highLow = current.high - current.low;
		if (i === 0) {
			ranges[i] = highLow;
			continue;
		}
		const previousClose = bars[i - 1].close;
		const highClose = Math.abs(current.high - previousClose);
		const lowClose = Math.abs(current.low - previousClose);
		ranges[i] = Math.max(highLow, highClose, lowClose);
	}
	return ranges;
}

/** Rolling mean of true range, defined from index `period - 1`. */
export function atrSeries(
	bars: readonly PriceBar[],
	period = 14
): IndicatorSeries {
	assertPeriod(period);
	const ranges = trueRangeSeries(bars);
	const series: Array<number | null> = new Array(bars.length);
	for (let i = 0; i < bars.length; i += 1) {
		series[i] = windowMean(ranges, i, period);
	}
	return series;
}
