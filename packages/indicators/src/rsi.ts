import type { IndicatorSeries } from "@backlab/core";
import { assertPeriod } from "./validation";

/**
 * Relative strength index using plain rolling means of gains and losses over
 * the last `period` close-to-close changes. Defined from index `period`.
 * A window with no movement at all yields `null`.
 */
export function rsiSeries(
	closes: readonly number[],
	period = 14
): IndicatorSeries {
	assertPeriod(period);
	const series: Array<number | null> = new Array(closes.length).fill(null);

	for (let i = period; i < closes.length; i += 1) {
		let gains = 0;
		let losses = 0;
		for (let j = i - period + 1; j <= i; j += 1) {
			const change = closes[j] - closes[j - 1];
			if (change > 0) {
				gains += change;
			} else {
				losses -= change;
			}
		}
		const avgGain = gains / period;
		const avgLoss = losses / period;
		if (avgLoss === 0) {
			series[i] = avgGain > 0 ? 100 : null;
			continue;
		}
		const rs = avgGain / avgLoss;
		series[i] = 100 - 100 / (1 + rs);
	}

	return series;
}
