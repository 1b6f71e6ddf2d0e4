import fs from "node:fs";
import path from "node:path";
import { DAY_MS, formatTimestamp, timeframeToMs, type Candle } from "@backlab/core";
import { fetchHistoricalCandles } from "./historical";
import type { CandleCacheOptions, CandleLoadResult } from "./types";
import { DataValidationError, assertCandleSeries } from "./validation";

export const CANDLE_CACHE_HEADER = [
	"timestamp",
	"datetime",
	"open",
	"high",
	"low",
	"close",
	"volume",
] as const;

export interface CandleCacheMeta {
	symbol: string;
	timeframe: string;
}

export const formatCandleCsv = (candles: readonly Candle[]): string => {
	const lines = candles.map((candle) =>
		[
			candle.timestamp,
			formatTimestamp(candle.timestamp),
			candle.open,
			candle.high,
			candle.low,
			candle.close,
			candle.volume,
		].join(",")
	);
	return [CANDLE_CACHE_HEADER.join(","), ...lines].join("\n") + "\n";
};

export const parseCandleCsv = (text: string, meta: CandleCacheMeta): Candle[] => {
	const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
	if (!lines.length) {
		return [];
	}
	const header = lines[0].split(",").map((cell) => cell.trim());
	const column = (name: string): number => {
		const index = header.indexOf(name);
		if (index < 0) {
			throw new DataValidationError(`cache header is missing "${name}"`);
		}
		return index;
	};
	const columns = {
		timestamp: column("timestamp"),
		open: column("open"),
		high: column("high"),
		low: column("low"),
		close: column("close"),
		volume: column("volume"),
	};
	return lines.slice(1).map((line, row) => {
		const cells = line.split(",");
		const read = (field: keyof typeof columns): number => {
			const value = Number(cells[columns[field]]);
			if (!Number.isFinite(value)) {
				throw new DataValidationError(`cache row ${row + 1}: ${field} is not a number`);
			}
			return value;
		};
		return {
			symbol: meta.symbol,
			timeframe: meta.timeframe,
			timestamp: read("timestamp"),
			open: read("open"),
			high: read("high"),
			low: read("low"),
			close: read("close"),
			volume: read("volume"),
		};
	});
};

/** Returns null when there is no cache file yet. */
export const readCandleCache = async (
	filePath: string,
	meta: CandleCacheMeta
): Promise<Candle[] | null> => {
	let text: string;
	try {
		text = await fs.promises.readFile(filePath, "utf8");
	} catch (error) {
		if (isMissingFile(error)) {
			return null;
		}
		throw error;
	}
	const candles = parseCandleCsv(text, meta);
	assertCandleSeries(candles);
	return candles;
};

export const writeCandleCache = async (
	filePath: string,
	candles: readonly Candle[]
): Promise<void> => {
	await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
	await fs.promises.writeFile(filePath, formatCandleCsv(candles), "utf8");
};

/**
 * A cache counts when it spans the wanted window less one day; only its
 * newest window of bars is returned. Anything shorter is refetched and the
 * cache rewritten.
 */
export const loadCandlesWithCache = async (
	options: CandleCacheOptions
): Promise<CandleLoadResult> => {
	const spanMs = options.days * DAY_MS;
	const meta = { symbol: options.symbol, timeframe: options.timeframe };

	if (options.useCache ?? true) {
		const cached = await readCandleCache(options.cachePath, meta);
		if (cached && cached.length) {
			const first = cached[0].timestamp;
			const last = cached[cached.length - 1].timestamp;
			if (last - first >= spanMs - DAY_MS) {
				const windowStart = last - spanMs + timeframeToMs(options.timeframe);
				const candles = cached.filter((candle) => candle.timestamp >= windowStart);
				options.logger?.info?.("candle_cache_hit", {
					path: options.cachePath,
					candles: candles.length,
				});
				return { candles, source: "cache" };
			}
			options.logger?.info?.("candle_cache_short", {
				path: options.cachePath,
				cachedDays: Math.floor((last - first) / DAY_MS),
				wantedDays: options.days,
			});
		}
	}

	const candles = await fetchHistoricalCandles({
		client: options.client,
		symbol: options.symbol,
		timeframe: options.timeframe,
		startTimestamp: options.now - spanMs,
		endTimestamp: options.now,
		batchSize: options.batchSize,
		logger: options.logger,
	});
	assertCandleSeries(candles);
	await writeCandleCache(options.cachePath, candles);
	options.logger?.info?.("candle_cache_written", {
		path: options.cachePath,
		candles: candles.length,
	});
	return { candles, source: "exchange" };
};

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";
