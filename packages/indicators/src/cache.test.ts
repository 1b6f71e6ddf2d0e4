import { describe, expect, it } from "vitest";
import { IndicatorCache } from "./cache";
import { buildCandles } from "./__tests__/helpers";

describe("IndicatorCache", () => {
	it("computes each series once per range", () => {
		const cache = new IndicatorCache(buildCandles([1, 2, 3, 4, 5]));
		const first = cache.sma(2);
		const second = cache.sma(2);
		expect(second).toBe(first);
		expect(cache.stats()).toEqual({
			rangeKey: "5:0:240000",
			entries: 1,
			hits: 1,
			misses: 1,
		});
		expect(cache.keys()).toEqual(["sma:2@5:0:240000"]);
	});

	it("stores frozen series", () => {
		const cache = new IndicatorCache(buildCandles([1, 2, 3]));
		expect(Object.isFrozen(cache.rsi(1))).toBe(true);
	});

	it("shares the ATR series behind an ATR average", () => {
		const cache = new IndicatorCache(buildCandles([1, 2, 3, 4, 5], { spread: 1 }));
		cache.atrAverage(2, 2);
		cache.atr(2);
		expect(cache.stats().hits).toBe(1);
		expect(cache.keys()).toEqual([
			"atr:2@5:0:240000",
			"atr_sma:2,2@5:0:240000",
		]);
	});
});
