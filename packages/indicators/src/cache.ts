import type { Candle, IndicatorSeries } from "@backlab/core";
import { adxSeries } from "./adx";
import { atrSeries } from "./atr";
import { higherTimeframeSmaSeries } from "./higherTimeframe";
import { rsiSeries } from "./rsi";
import { smaSeries } from "./sma";
import { assertPeriod } from "./validation";

/**
 * Indicator lookups a strategy needs. Implemented by IndicatorCache; tests can
 * hand strategies a fake.
 */
export interface IndicatorProvider {
	readonly length: number;
	/** `count:firstTimestamp:lastTimestamp` of the bars the series cover. */
	readonly rangeKey: string;
	sma(period: number): IndicatorSeries;
	rsi(period: number): IndicatorSeries;
	atr(period: number): IndicatorSeries;
	atrAverage(atrPeriod: number, averagePeriod: number): IndicatorSeries;
	adx(period: number): IndicatorSeries;
	higherTimeframeSma(timeframe: string, period: number): IndicatorSeries;
}

export interface IndicatorCacheStats {
	rangeKey: string;
	entries: number;
	hits: number;
	misses: number;
}

export const buildRangeKey = (candles: readonly Candle[]): string => {
	if (!candles.length) {
		return "0";
	}
	const first = candles[0].timestamp;
	const last = candles[candles.length - 1].timestamp;
	return `${candles.length}:${first}:${last}`;
};

/**
 * Lazily computed, frozen indicator series for one bar range. Keys are
 * `kind:params@range`, so parameter sets that share a period share a series.
 * Entries are never replaced once stored.
 */
export class IndicatorCache implements IndicatorProvider {
	readonly rangeKey: string;
	private readonly entries = new Map<string, IndicatorSeries>();
	private readonly closes: readonly number[];
	private hitCount = 0;
	private missCount = 0;

	constructor(private readonly candles: readonly Candle[]) {
		this.rangeKey = buildRangeKey(candles);
		this.closes = candles.map((candle) => candle.close);
	}

	get length(): number {
		return this.candles.length;
	}

	sma(period: number): IndicatorSeries {
		assertPeriod(period);
		return this.memo(`sma:${period}`, () => smaSeries(this.closes, period));
	}

	rsi(period: number): IndicatorSeries {
		assertPeriod(period);
		return this.memo(`rsi:${period}`, () => rsiSeries(this.closes, period));
	}

	atr(period: number): IndicatorSeries {
		assertPeriod(period);
		return this.memo(`atr:${period}`, () => atrSeries(this.candles, period));
	}

	atrAverage(atrPeriod: number, averagePeriod: number): IndicatorSeries {
		assertPeriod(averagePeriod, "averagePeriod");
		return this.memo(`atr_sma:${atrPeriod},${averagePeriod}`, () =>
			smaSeries(this.atr(atrPeriod), averagePeriod)
		);
	}

	adx(period: number): IndicatorSeries {
		assertPeriod(period);
		return this.memo(`adx:${period}`, () => adxSeries(this.candles, period));
	}

	higherTimeframeSma(timeframe: string, period: number): IndicatorSeries {
		assertPeriod(period);
		return this.memo(`htf_sma:${timeframe},${period}`, () =>
			higherTimeframeSmaSeries(this.candles, timeframe, period)
		);
	}

	stats(): IndicatorCacheStats {
		return {
			rangeKey: this.rangeKey,
			entries: this.entries.size,
			hits: this.hitCount,
			misses: this.missCount,
		};
	}

	keys(): string[] {
		return Array.from(this.entries.keys());
	}

	private memo(key: string, compute: () => IndicatorSeries): IndicatorSeries {
		const fullKey = `${key}@${this.rangeKey}`;
		const existing = this.entries.get(fullKey);
		if (existing) {
			this.hitCount += 1;
			return existing;
		}
		this.missCount += 1;
		const series = Object.freeze(compute().slice());
		this.entries.set(fullKey, series);
		return series;
	}
}
