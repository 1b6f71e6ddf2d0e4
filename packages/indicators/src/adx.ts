import type { IndicatorSeries } from "@backlab/core";
import { trueRangeSeries, type PriceBar } from "./atr";
import { assertPeriod, windowMean } from "./validation";

export interface AdxDetail {
	adx: IndicatorSeries;
	plusDi: IndicatorSeries;
	minusDi: IndicatorSeries;
	dx: IndicatorSeries;
}

const directionalMovement = (
	bars: readonly PriceBar[]
): { plus: Array<number | null>; minus: Array<number | null> } => {
	const plus: Array<number | null> = new Array(bars.length).fill(null);
	const minus: Array<number | null> = new Array(bars.length).fill(null);
	for (let i = 1; i < bars.length; i += 1) {
		const up = bars[i].high - bars[i - 1].high;
		const down = bars[i - 1].low - bars[i].low;
		plus[i] = up > down && up > 0 ? up : 0;
		minus[i] = down > up && down > 0 ? down : 0;
	}
	return { plus, minus };
};

/**
 * Average directional index with plain rolling means in place of Wilder
 * smoothing. DX is defined from index `period`, ADX from `2 * period - 1`.
 * Zero true range gives zero DI; zero DI sum gives zero DX.
 */
export function adxDetail(bars: readonly PriceBar[], period = 14): AdxDetail {
	assertPeriod(period);
	const ranges = trueRangeSeries(bars);
	const { plus, minus } = directionalMovement(bars);
	const plusDi: Array<number | null> = new Array(bars.length).fill(null);
	const minusDi: Array<number | null> = new Array(bars.length).fill(null);
	const dx: Array<number | null> = new Array(bars.length).fill(null);

	for (let i = period; i < bars.length; i += 1) {
		const meanTr = windowMean(ranges, i, period);
		const meanPlus = windowMean(plus, i, period);
		const meanMinus = windowMean(minus, i, period);
		if (meanTr === null || meanPlus === null || meanMinus === null) {
			continue;
		}
		const pdi = meanTr === 0 ? 0 : (100 * meanPlus) / meanTr;
		const mdi = meanTr === 0 ? 0 : (100 * meanMinus) / meanTr;
		const sum = pdi + mdi;
		plusDi[i] = pdi;
		minusDi[i] = mdi;
		dx[i] = sum === 0 ? 0 : (100 * Math.abs(pdi - mdi)) / sum;
	}

	const adx: Array<number | null> = new Array(bars.length);
	for (let i = 0; i < bars.length; i += 1) {
		adx[i] = windowMean(dx, i, period);
	}

	return { adx, plusDi, minusDi, dx };
}

export function adxSeries(
	bars: readonly PriceBar[],
	period = 14
): IndicatorSeries {
	return adxDetail(bars, period).adx;
}
