import { ConfigError, timeframeToMs, type Candle } from "@backlab/core";
import type { HistoricalFetchOptions } from "./types";

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 10_000;

/**
 * Pages through `[startTimestamp, endTimestamp]` in batches. Duplicate
 * timestamps across pages are dropped and the first bar past the end stops
 * the fetch.
 */
export const fetchHistoricalCandles = async (
	options: HistoricalFetchOptions
): Promise<Candle[]> => {
	if (options.endTimestamp < options.startTimestamp) {
		throw new ConfigError(
			`end ${options.endTimestamp} is before start ${options.startTimestamp}`,
			"endTimestamp"
		);
	}
	const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const maxIterations = Math.max(
		options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		1
	);
	const timeframeMs = timeframeToMs(options.timeframe);

	const result: Candle[] = [];
	const seenTimestamps = new Set<number>();
	let since = Math.max(0, options.startTimestamp);
	let iterations = 0;

	while (since <= options.endTimestamp && iterations < maxIterations) {
		const batch = await options.client.fetchOHLCV(
			options.symbol,
			options.timeframe,
			batchSize,
			since
		);
		iterations += 1;

		if (!batch.length) {
			break;
		}

		for (const candle of batch) {
			if (candle.timestamp > options.endTimestamp) {
				return result;
			}
			if (
				candle.timestamp >= options.startTimestamp &&
				!seenTimestamps.has(candle.timestamp)
			) {
				result.push(candle);
				seenTimestamps.add(candle.timestamp);
			}
		}

		options.logger?.debug?.("historical_batch_fetched", {
			timeframe: options.timeframe,
			batch: batch.length,
			total: result.length,
		});

		const last = batch[batch.length - 1];
		since = Math.max(last.timestamp + timeframeMs, since + timeframeMs);
		if (batch.length < batchSize) {
			break;
		}
	}

	if (iterations >= maxIterations) {
		options.logger?.warn?.("historical_fetch_iterations_exceeded", {
			timeframe: options.timeframe,
			startTimestamp: options.startTimestamp,
			endTimestamp: options.endTimestamp,
			iterations,
			maxIterations,
		});
	}

	return result;
};
