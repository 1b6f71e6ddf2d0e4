import { describe, expect, it } from "vitest";
import { DataValidationError, assertCandleSeries } from "./validation";
import { buildCandles } from "./__tests__/helpers";

describe("assertCandleSeries", () => {
	it("accepts a clean ascending series", () => {
		expect(() => assertCandleSeries(buildCandles(5, 0, 60_000))).not.toThrow();
	});

	it("rejects repeated timestamps", () => {
		const [first] = buildCandles(1, 0, 60_000);
		expect(() => assertCandleSeries([first, { ...first }])).toThrow(
			"candle[1]: timestamp 0 does not follow 0"
		);
	});

	it("rejects a high below the low", () => {
		const [candle] = buildCandles(1, 0, 60_000);
		expect(() => assertCandleSeries([{ ...candle, high: 90 }])).toThrow(
			"candle[0]: high 90 is below low 99"
		);
	});

	it("rejects non-positive prices and negative volume", () => {
		const [candle] = buildCandles(1, 0, 60_000);
		expect(() => assertCandleSeries([{ ...candle, close: 0 }])).toThrow(DataValidationError);
		expect(() => assertCandleSeries([{ ...candle, volume: -1 }])).toThrow(
			"candle[0]: volume must be non-negative, got -1"
		);
	});
});
