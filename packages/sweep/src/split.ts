import { ConfigError, DEFAULT_TRAIN_RATIO, type Candle, type SplitConfig } from "@backlab/core";

export interface CandleSplit {
	cutoff: number;
	train: readonly Candle[];
	test: readonly Candle[];
}

/** Train gets bars strictly before the cutoff, test gets the rest. */
export const splitByTimestamp = (
	candles: readonly Candle[],
	cutoff: number
): CandleSplit => {
	const train = candles.filter((candle) => candle.timestamp < cutoff);
	const test = candles.filter((candle) => candle.timestamp >= cutoff);
	if (!train.length) {
		throw new ConfigError(`no candles before cutoff ${cutoff}`, "split.train");
	}
	if (!test.length) {
		throw new ConfigError(`no candles at or after cutoff ${cutoff}`, "split.test");
	}
	return { cutoff, train, test };
};

/**
 * Resolves the split to a cutoff timestamp. With a train ratio the first test
 * bar is at index floor(length * ratio).
 */
export const resolveSplitCutoff = (
	candles: readonly Candle[],
	split: SplitConfig = {}
): number => {
	if (split.cutoff !== undefined) {
		return split.cutoff;
	}
	const ratio = split.trainRatio ?? DEFAULT_TRAIN_RATIO;
	if (!(ratio > 0 && ratio < 1)) {
		throw new ConfigError(`must be in (0, 1), got ${ratio}`, "split.trainRatio");
	}
	const index = Math.floor(candles.length * ratio);
	if (index <= 0 || index >= candles.length) {
		throw new ConfigError(
			`ratio ${ratio} leaves an empty window for ${candles.length} candles`,
			"split.trainRatio"
		);
	}
	return candles[index].timestamp;
};
