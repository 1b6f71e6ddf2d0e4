import { describe, expect, it } from "vitest";
import { ConfigError } from "@backlab/core";
import { strategyRegistry } from "@backlab/strategy-engine";
import { expandGrid, expandRawGrid } from "./grid";

describe("expandGrid", () => {
	it("produces the full cross product with the first key varying slowest", () => {
		expect(expandGrid<number | string>({ a: [1, 2], b: ["x", "y"] })).toEqual([
			{ a: 1, b: "x" },
			{ a: 1, b: "y" },
			{ a: 2, b: "x" },
			{ a: 2, b: "y" },
		]);
	});

	it("multiplies the list sizes", () => {
		const combos = expandGrid({
			shortPeriod: [5, 10, 15, 20, 25],
			longPeriod: [20, 30, 40, 50, 75, 100],
		});
		expect(combos).toHaveLength(30);
		expect(combos[29]).toEqual({ shortPeriod: 25, longPeriod: 100 });
	});

	it("rejects an empty value list with the field path", () => {
		expect(() => expandGrid({ a: [1], b: [] })).toThrow(ConfigError);
		expect(() => expandGrid({ a: [1], b: [] })).toThrow(
			"grid.b: must list at least one value"
		);
	});

	it("rejects a grid without parameters", () => {
		expect(() => expandGrid({}, "strategies[0].grid")).toThrow(
			"strategies[0].grid: must list at least one parameter"
		);
	});
});

describe("expandRawGrid", () => {
	it("expands value lists nested inside filter objects", () => {
		const combos = expandRawGrid({
			shortPeriod: [20],
			filter: [
				{ mode: "adx", adxPeriod: [14, 21], threshold: 25 },
				{ mode: "higher_timeframe", timeframe: "4h", shortPeriod: 5, longPeriod: 20 },
			],
		});
		expect(combos).toEqual([
			{ shortPeriod: 20, filter: { mode: "adx", adxPeriod: 14, threshold: 25 } },
			{ shortPeriod: 20, filter: { mode: "adx", adxPeriod: 21, threshold: 25 } },
			{
				shortPeriod: 20,
				filter: { mode: "higher_timeframe", timeframe: "4h", shortPeriod: 5, longPeriod: 20 },
			},
		]);
	});

	it("names the nested field when a filter list is empty", () => {
		expect(() =>
			expandRawGrid({ filter: [{ mode: "adx", adxPeriod: [], threshold: 25 }] })
		).toThrow("grid.filter[0].adxPeriod: must list at least one value");
	});
});

describe("registered default grids", () => {
	it("expand into parameter sets every variant accepts", () => {
		const counts = strategyRegistry.map((variant) => {
			const combos = expandRawGrid(variant.defaultGrid);
			combos.forEach((combo) => variant.parseParams(combo));
			return [variant.id, combos.length];
		});
		expect(counts).toEqual([
			["ma_crossover", 30],
			["rsi_reversal", 27],
			["trend_filtered_crossover", 20],
		]);
	});
});
