import { ConfigError } from "../errors";
import { DAY_MS, HOUR_MS, MINUTE_MS } from "./constants";

/**
 * Pure time utilities. All functions operate on UTC epoch milliseconds.
 */

const TIMEFRAME_PATTERN = /^(\d+)([mhd])$/;

/**
 * Parse a timeframe such as "1m", "4h" or "1d" into milliseconds.
 * @throws ConfigError if the timeframe is malformed
 */
export const timeframeToMs = (timeframe: string): number => {
	if (typeof timeframe !== "string" || !timeframe.trim()) {
		throw new ConfigError(
			`Invalid timeframe: expected non-empty string, got ${typeof timeframe}`
		);
	}

	const match = timeframe.trim().toLowerCase().match(TIMEFRAME_PATTERN);
	if (!match) {
		throw new ConfigError(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new ConfigError(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	switch (match[2]) {
		case "m":
			return n * MINUTE_MS;
		case "h":
			return n * HOUR_MS;
		default:
			return n * DAY_MS;
	}
};

/**
 * Bucket a timestamp to the start of its timeframe period.
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, tfMs: number): number => {
	if (!Number.isFinite(ts) || ts < 0) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(tfMs) || tfMs <= 0) {
		throw new Error(`Invalid timeframe ms: ${tfMs}`);
	}
	return Math.floor(ts / tfMs) * tfMs;
};

export const formatTimestamp = (ts: number): string =>
	new Date(ts).toISOString();
