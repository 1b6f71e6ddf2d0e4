import { describe, expect, it } from "vitest";
import type { Candle } from "@backlab/core";
import { PositionTracker, type RiskSettings } from "./positionTracker";

const settings: RiskSettings = {
	feeRate: 0.001,
	positionSizePercent: 0.5,
	minTradeUnit: 0.0001,
	stopLossPercent: 0.1,
};

const buildCandle = (close: number, timestamp = 0): Candle => ({
	symbol: "BTC/USDT",
	timeframe: "1h",
	timestamp,
	open: close,
	high: close,
	low: close,
	close,
	volume: 1,
});

const buy = { signal: "BUY" as const, reason: "test_buy" };
const sell = { signal: "SELL" as const, reason: "test_sell" };

describe("PositionTracker", () => {
	it("spends a fraction of cash and takes the fee from the quantity", () => {
		const tracker = new PositionTracker(settings, 1000);
		const outcome = tracker.apply(buy, buildCandle(100, 1));
		expect(outcome.kind).toBe("executed");
		if (outcome.kind !== "executed") return;
		expect(outcome.trade).toMatchObject({
			action: "BUY",
			price: 100,
			value: 500,
			cashBalance: 500,
			reason: "signal",
			signalReason: "test_buy",
		});
		expect(outcome.trade.quantity).toBeCloseTo(4.995, 12);
		expect(outcome.trade.fee).toBeCloseTo(0.5, 12);
		expect(tracker.state.status).toBe("HOLDING");
	});

	it("ignores a BUY while holding and a SELL while flat", () => {
		const tracker = new PositionTracker(settings, 1000);
		expect(tracker.apply(sell, buildCandle(100))).toEqual({
			kind: "ignored",
			reason: "no_position",
		});
		tracker.apply(buy, buildCandle(100));
		expect(tracker.apply(buy, buildCandle(101))).toEqual({
			kind: "ignored",
			reason: "already_holding",
		});
		expect(tracker.cashBalance).toBe(500);
	});

	it("sells the whole position and reports net P&L", () => {
		const tracker = new PositionTracker(settings, 1000);
		tracker.apply(buy, buildCandle(100, 1));
		const outcome = tracker.apply(sell, buildCandle(110, 2));
		if (outcome.kind !== "executed" || !outcome.closed) {
			throw new Error("expected a closed position");
		}
		const gross = 4.995 * 110;
		const fee = gross * 0.001;
		expect(outcome.trade.fee).toBeCloseTo(fee, 9);
		expect(outcome.closed.pnl).toBeCloseTo(gross - fee - 500, 9);
		expect(tracker.cashBalance).toBeCloseTo(500 + gross - fee, 9);
		expect(tracker.state).toEqual({ status: "FLAT" });
	});

	it("rejects entries below the minimum trade unit", () => {
		const tracker = new PositionTracker({ ...settings, minTradeUnit: 10 }, 1000);
		const outcome = tracker.apply(buy, buildCandle(100));
		expect(outcome).toMatchObject({ kind: "ignored", reason: "below_min_trade_unit" });
		expect(tracker.cashBalance).toBe(1000);
	});

	it("rejects entries without capital", () => {
		const tracker = new PositionTracker(settings, 0);
		expect(tracker.apply(buy, buildCandle(100))).toMatchObject({
			kind: "ignored",
			reason: "insufficient_capital",
		});
	});

	it("triggers the stop-loss at exactly the stop price", () => {
		const tracker = new PositionTracker(settings, 1000);
		tracker.apply(buy, buildCandle(100));
		expect(tracker.checkStopLoss(buildCandle(90.01))).toBe(false);
		expect(tracker.checkStopLoss(buildCandle(90))).toBe(true);
		const outcome = tracker.stopOut(buildCandle(90));
		expect(outcome).toMatchObject({
			kind: "executed",
			trade: { action: "SELL", reason: "stop_loss" },
		});
	});

	it("does not check stops while flat", () => {
		const tracker = new PositionTracker(settings, 1000);
		expect(tracker.checkStopLoss(buildCandle(1))).toBe(false);
	});

	it("marks equity and the open position to the given price", () => {
		const tracker = new PositionTracker(settings, 1000);
		tracker.apply(buy, buildCandle(100, 5));
		const snapshot = tracker.snapshot(120);
		expect(snapshot.cash).toBe(500);
		expect(snapshot.equity).toBeCloseTo(500 + 4.995 * 120, 9);
		const report = tracker.openPositionReport(120);
		expect(report?.entryTimestamp).toBe(5);
		expect(report?.unrealizedPnl).toBeCloseTo(4.995 * 120 - 500, 9);
	});
});
