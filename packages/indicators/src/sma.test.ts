import { describe, expect, it } from "vitest";
import { ConfigError } from "@backlab/core";
import { sma, smaSeries } from "./sma";

describe("smaSeries", () => {
	it("is null during warm-up and averages the trailing window", () => {
		expect(smaSeries([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
	});

	it("propagates nulls from an indicator input", () => {
		expect(smaSeries([null, 2, 4, 6], 2)).toEqual([null, null, 3, 5]);
	});

	it("returns all nulls when the series is shorter than the period", () => {
		expect(smaSeries([1, 2], 5)).toEqual([null, null]);
	});

	it("rejects non-positive and fractional periods", () => {
		expect(() => smaSeries([1, 2, 3], 0)).toThrowError(ConfigError);
		expect(() => smaSeries([1, 2, 3], 2.5)).toThrowError(ConfigError);
	});
});

describe("sma", () => {
	it("returns the mean of the last window", () => {
		expect(sma([10, 20, 30, 40], 2)).toBe(35);
	});

	it("returns null when there is not enough data", () => {
		expect(sma([10], 2)).toBeNull();
	});
});
