import { describe, expect, it } from "vitest";
import { hashJson, stableStringify, summarizeCandles } from "./fingerprint";

describe("stableStringify", () => {
	it("sorts keys at every depth", () => {
		expect(stableStringify({ b: 1, a: { d: 2, c: [3, { f: 4, e: 5 }] } })).toBe(
			'{"a":{"c":[3,{"e":5,"f":4}],"d":2},"b":1}'
		);
	});

	it("drops undefined properties", () => {
		expect(stableStringify({ a: undefined, b: null })).toBe('{"b":null}');
	});
});

describe("hashJson", () => {
	it("is insensitive to key order", () => {
		expect(hashJson({ shortPeriod: 5, longPeriod: 20 })).toBe(
			hashJson({ longPeriod: 20, shortPeriod: 5 })
		);
	});

	it("truncates to the requested length", () => {
		expect(hashJson({ a: 1 }, 8)).toHaveLength(8);
		expect(hashJson({ a: 1 }, 0)).toHaveLength(40);
	});
});

describe("summarizeCandles", () => {
	it("reports nulls for an empty series", () => {
		expect(summarizeCandles([])).toEqual({
			count: 0,
			firstTimestamp: null,
			lastTimestamp: null,
			hash: null,
		});
	});
});
