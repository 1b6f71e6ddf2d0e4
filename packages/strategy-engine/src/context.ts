import type { Candle, IndicatorSeries } from "@backlab/core";
import type { SignalContext } from "./types";

export const createSignalContext = (
	candles: readonly Candle[],
	index: number
): SignalContext => ({
	index,
	candle: candles[index],
	value(series: IndicatorSeries, offset = 0): number | null {
		const target = index - offset;
		if (offset < 0 || target < 0 || target >= series.length) {
			return null;
		}
		return series[target] ?? null;
	},
});
