import type { Candle, IndicatorSeries } from "@backlab/core";
import { bucketTimestamp, timeframeToMs } from "@backlab/core";
import { smaSeries } from "./sma";

/**
 * Folds candles that share a target bucket into one OHLCV candle. Input must
 * be sorted by timestamp.
 */
export function aggregateCandle(
	bucketCandles: readonly Candle[],
	targetTimeframe: string,
	bucketStart: number
): Candle | null {
	if (!bucketCandles.length) {
		return null;
	}
	const first = bucketCandles[0];
	const last = bucketCandles[bucketCandles.length - 1];
	let high = first.high;
	let low = first.low;
	let volume = 0;
	for (const candle of bucketCandles) {
		high = Math.max(high, candle.high);
		low = Math.min(low, candle.low);
		volume += candle.volume;
	}
	return {
		symbol: first.symbol,
		timeframe: targetTimeframe,
		timestamp: bucketStart,
		open: first.open,
		high,
		low,
		close: last.close,
		volume,
	};
}

export interface AggregatedCandles {
	/** One candle per bucket, in order. */
	candles: Candle[];
	/** For each base candle, the index of its bucket in `candles`. */
	bucketIndex: number[];
}

export function aggregateCandles(
	candles: readonly Candle[],
	targetTimeframe: string
): AggregatedCandles {
	const tfMs = timeframeToMs(targetTimeframe);
	const aggregated: Candle[] = [];
	const bucketIndex: number[] = new Array(candles.length);
	let pending: Candle[] = [];
	let pendingBucket: number | null = null;

	const flush = (): void => {
		if (pendingBucket === null) {
			return;
		}
		const candle = aggregateCandle(pending, targetTimeframe, pendingBucket);
		if (candle) {
			aggregated.push(candle);
		}
		pending = [];
	};

	candles.forEach((candle, index) => {
		const bucket = bucketTimestamp(candle.timestamp, tfMs);
		if (pendingBucket !== bucket) {
			flush();
			pendingBucket = bucket;
		}
		pending.push(candle);
		bucketIndex[index] = aggregated.length;
	});
	flush();

	return { candles: aggregated, bucketIndex };
}

/**
 * SMA of higher-timeframe closes mapped back onto base candles. A base candle
 * only sees buckets that closed before its own bucket opened.
 */
export function higherTimeframeSmaSeries(
	candles: readonly Candle[],
	targetTimeframe: string,
	period: number
): IndicatorSeries {
	const { candles: buckets, bucketIndex } = aggregateCandles(
		candles,
		targetTimeframe
	);
	const bucketSma = smaSeries(
		buckets.map((candle) => candle.close),
		period
	);
	return bucketIndex.map((bucket) =>
		bucket > 0 ? bucketSma[bucket - 1] : null
	);
}
