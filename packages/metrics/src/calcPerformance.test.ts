import { describe, expect, it } from "vitest";
import type { Trade } from "@backlab/core";
import { analyzeEquityCurve, calculatePerformance } from "./calcPerformance";

const trade = (overrides: Partial<Trade> & Pick<Trade, "action" | "value">): Trade => ({
	timestamp: 0,
	price: 100,
	quantity: 1,
	fee: 0,
	cashBalance: 0,
	assetBalance: 0,
	reason: "signal",
	signalReason: "test",
	...overrides,
});

describe("analyzeEquityCurve", () => {
	it("measures drawdown from the starting capital", () => {
		const analysis = analyzeEquityCurve(
			[
				{ timestamp: 1, equity: 90 },
				{ timestamp: 2, equity: 120 },
				{ timestamp: 3, equity: 96 },
				{ timestamp: 4, equity: 130 },
			],
			100
		);
		expect(analysis.maxDrawdownPct).toBeCloseTo(20, 10);
		expect(analysis.maxDrawdown).toBeCloseTo(24, 10);
		expect(analysis.drawdowns).toHaveLength(2);
		expect(analysis.drawdowns[0]).toMatchObject({
			peakTimestamp: null,
			troughTimestamp: 1,
			recoveryTimestamp: 2,
		});
		expect(analysis.drawdowns[1]).toMatchObject({
			peakTimestamp: 2,
			troughTimestamp: 3,
			recoveryTimestamp: 4,
			durationMs: 1,
			recoveryMs: 2,
		});
	});

	it("reports zero for a curve that never dips", () => {
		const analysis = analyzeEquityCurve([{ timestamp: 1, equity: 100 }], 100);
		expect(analysis).toEqual({ drawdowns: [], maxDrawdown: 0, maxDrawdownPct: 0 });
	});
});

describe("calculatePerformance", () => {
	const trades: Trade[] = [
		trade({ action: "BUY", value: 100, timestamp: 1 }),
		trade({ action: "SELL", value: 110, timestamp: 2 }),
		trade({ action: "BUY", value: 100, timestamp: 3 }),
		trade({ action: "SELL", value: 95, timestamp: 4, reason: "stop_loss" }),
		trade({ action: "BUY", value: 50, timestamp: 5 }),
	];

	it("counts completed round trips only", () => {
		const { metrics, roundTrips } = calculatePerformance({
			trades,
			equityCurve: [],
			startingCapital: 1000,
			finalEquity: 1010,
			realizedEquity: 1005,
		});
		expect(roundTrips.map((trip) => trip.pnl)).toEqual([10, -5]);
		expect(metrics.tradeCount).toBe(2);
		expect(metrics.winRate).toBe(0.5);
		expect(metrics.grossProfit).toBe(10);
		expect(metrics.grossLoss).toBe(5);
		expect(metrics.profitFactor).toBe(2);
		expect(metrics.stopLossCount).toBe(1);
		expect(metrics.returnPct).toBe(1);
		expect(metrics.realizedReturnPct).toBe(0.5);
		expect(metrics.unrealizedPnl).toBe(5);
		expect(metrics.netProfit).toBe(10);
		expect(metrics.avgTradeReturnPct).toBe(2.5);
	});

	it("reports an infinite profit factor with wins and no losses", () => {
		const { metrics } = calculatePerformance({
			trades: trades.slice(0, 2),
			equityCurve: [],
			startingCapital: 1000,
			finalEquity: 1010,
			realizedEquity: 1010,
		});
		expect(metrics.profitFactor).toBe(Number.POSITIVE_INFINITY);
	});

	it("reports zeros without round trips", () => {
		const { metrics } = calculatePerformance({
			trades: [],
			equityCurve: [],
			startingCapital: 500,
			finalEquity: 500,
			realizedEquity: 500,
		});
		expect(metrics).toMatchObject({
			tradeCount: 0,
			winRate: 0,
			profitFactor: 0,
			returnPct: 0,
			maxDrawdownPct: 0,
		});
	});
});
