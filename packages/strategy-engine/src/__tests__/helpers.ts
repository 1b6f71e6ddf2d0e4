import type { Candle, IndicatorSeries } from "@backlab/core";
import type { IndicatorProvider } from "@backlab/indicators";

export const buildCandles = (closes: readonly number[], stepMs = 3_600_000): Candle[] =>
	closes.map((close, index) => ({
		symbol: "BTC/USDT",
		timeframe: "1h",
		timestamp: index * stepMs,
		open: close,
		high: close,
		low: close,
		close,
		volume: 1,
	}));

export interface FakeSeries {
	sma?: Record<number, IndicatorSeries>;
	rsi?: Record<number, IndicatorSeries>;
	atr?: Record<number, IndicatorSeries>;
	atrAverage?: IndicatorSeries;
	adx?: Record<number, IndicatorSeries>;
	higherTimeframeSma?: Record<number, IndicatorSeries>;
}

const lookup = (
	table: Record<number, IndicatorSeries> | undefined,
	key: number,
	kind: string
): IndicatorSeries => {
	const series = table?.[key];
	if (!series) {
		throw new Error(`no fake ${kind} series for ${key}`);
	}
	return series;
};

export const createFakeIndicators = (
	length: number,
	fake: FakeSeries
): IndicatorProvider => ({
	length,
	rangeKey: `fake:${length}`,
	sma: (period) => lookup(fake.sma, period, "sma"),
	rsi: (period) => lookup(fake.rsi, period, "rsi"),
	atr: (period) => lookup(fake.atr, period, "atr"),
	atrAverage: () => {
		if (!fake.atrAverage) {
			throw new Error("no fake atrAverage series");
		}
		return fake.atrAverage;
	},
	adx: (period) => lookup(fake.adx, period, "adx"),
	higherTimeframeSma: (_timeframe, period) =>
		lookup(fake.higherTimeframeSma, period, "higherTimeframeSma"),
});
