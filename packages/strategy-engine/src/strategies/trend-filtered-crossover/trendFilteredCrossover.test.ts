import { describe, expect, it } from "vitest";
import { ConfigError } from "@backlab/core";
import { createSignalContext } from "../../context";
import { bindStrategy } from "../../registry";
import { buildCandles, createFakeIndicators } from "../../__tests__/helpers";
import { trendFilteredCrossoverStrategy } from "./index";
import { parseTrendFilter } from "./filters";

// Short crosses above long on bar 2 and back below on bar 4.
const SHORT = [null, 1, 3, 3, 1];
const LONG = [null, 2, 2, 2, 2];

describe("trend_filtered_crossover", () => {
	const candles = buildCandles([1, 2, 3, 4, 5]);

	it("suppresses a golden cross when ADX is below the threshold", () => {
		const indicators = createFakeIndicators(candles.length, {
			sma: { 2: SHORT, 4: LONG },
			adx: { 14: [null, null, 20, 20, 20] },
		});
		const signal = bindStrategy(trendFilteredCrossoverStrategy, {
			shortPeriod: 2,
			longPeriod: 4,
			filter: { mode: "adx", adxPeriod: 14, threshold: 25 },
		}).createSignal(indicators);
		expect(signal(createSignalContext(candles, 2))).toEqual({
			signal: "HOLD",
			reason: "trend_not_confirmed",
		});
		expect(signal(createSignalContext(candles, 4))).toEqual({
			signal: "SELL",
			reason: "dead_cross",
		});
	});

	it("lets a golden cross through when ATR is expanding", () => {
		const indicators = createFakeIndicators(candles.length, {
			sma: { 2: SHORT, 4: LONG },
			atr: { 14: [null, null, 1.3, 1, 1] },
			atrAverage: [null, null, 1, 1, 1],
		});
		const signal = bindStrategy(trendFilteredCrossoverStrategy, {
			shortPeriod: 2,
			longPeriod: 4,
			filter: { mode: "atr", atrPeriod: 14, averagePeriod: 20, multiplier: 1.2 },
		}).createSignal(indicators);
		expect(signal(createSignalContext(candles, 2))).toEqual({
			signal: "BUY",
			reason: "golden_cross",
		});
	});

	it("treats a missing higher-timeframe value as unconfirmed", () => {
		const indicators = createFakeIndicators(candles.length, {
			sma: { 2: SHORT, 4: LONG },
			higherTimeframeSma: { 10: [null, null, null, 5, 5], 20: [null, null, 4, 4, 4] },
		});
		const signal = bindStrategy(trendFilteredCrossoverStrategy, {
			shortPeriod: 2,
			longPeriod: 4,
			filter: { mode: "higher_timeframe", timeframe: "4h", shortPeriod: 10, longPeriod: 20 },
		}).createSignal(indicators);
		expect(signal(createSignalContext(candles, 2)).reason).toBe("trend_not_confirmed");
	});

	it("labels the filter", () => {
		expect(
			trendFilteredCrossoverStrategy.label({
				shortPeriod: 20,
				longPeriod: 50,
				filter: { mode: "adx", adxPeriod: 14, threshold: 25 },
			})
		).toBe("SMA(20/50) + ADX(14)>25");
	});

	it("flags a higher-timeframe filter with short >= long as not viable", () => {
		const params = trendFilteredCrossoverStrategy.parseParams({
			shortPeriod: 20,
			longPeriod: 50,
			filter: { mode: "higher_timeframe", timeframe: "1d", shortPeriod: 20, longPeriod: 20 },
		});
		expect(trendFilteredCrossoverStrategy.viabilityIssue(params)).toBe(
			"filter shortPeriod (20) must be less than longPeriod (20)"
		);
	});
});

describe("parseTrendFilter", () => {
	it("rejects an unknown mode", () => {
		expect(() => parseTrendFilter({ mode: "volume" })).toThrowError(
			'params.filter.mode: unknown filter mode "volume"'
		);
	});

	it("rejects an invalid timeframe", () => {
		expect(() =>
			parseTrendFilter({
				mode: "higher_timeframe",
				timeframe: "4x",
				shortPeriod: 10,
				longPeriod: 20,
			})
		).toThrowError(ConfigError);
	});
});
