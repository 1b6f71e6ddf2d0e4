import crypto from "node:crypto";
import type { Candle } from "../types";

const stableStringifyInternal = (value: unknown): string => {
	if (value === null || typeof value !== "object") {
		if (typeof value === "number" && !Number.isFinite(value)) {
			return JSON.stringify(String(value));
		}
		return JSON.stringify(value) ?? "null";
	}
	if (Array.isArray(value)) {
		return `[${value.map(stableStringifyInternal).join(",")}]`;
	}
	const entries = Object.entries(value)
		.filter(([, val]) => typeof val !== "undefined")
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(
			([key, val]) => `${JSON.stringify(key)}:${stableStringifyInternal(val)}`
		);
	return `{${entries.join(",")}}`;
};

/**
 * JSON with object keys sorted at every depth, so equal parameter sets
 * produce equal strings regardless of insertion order.
 */
export const stableStringify = (value: unknown): string => {
	return stableStringifyInternal(value);
};

export const hashJson = (value: unknown, length = 12): string => {
	const digest = crypto
		.createHash("sha1")
		.update(stableStringify(value))
		.digest("hex");
	return length > 0 ? digest.slice(0, length) : digest;
};

export interface CandleFingerprintSummary {
	count: number;
	firstTimestamp: number | null;
	lastTimestamp: number | null;
	hash: string | null;
}

export const summarizeCandles = (
	candles: readonly Candle[]
): CandleFingerprintSummary => ({
	count: candles.length,
	firstTimestamp: candles[0]?.timestamp ?? null,
	lastTimestamp: candles[candles.length - 1]?.timestamp ?? null,
	hash: candles.length ? hashJson(candles) : null,
});
