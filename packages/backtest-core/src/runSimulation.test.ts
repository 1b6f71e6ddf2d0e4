import { describe, expect, it } from "vitest";
import {
	ConfigError,
	DEFAULT_SIMULATION_SETTINGS,
	type Candle,
	type SimulationSettings,
	type TradeSignal,
} from "@backlab/core";
import {
	bindStrategy,
	maCrossoverStrategy,
	rsiReversalStrategy,
	type BoundStrategy,
} from "@backlab/strategy-engine";
import { IndicatorCache } from "@backlab/indicators";
import { SimulationError } from "./errors";
import { runSimulation } from "./runSimulation";

const HOUR = 3_600_000;

const buildCandles = (closes: readonly number[]): Candle[] =>
	closes.map((close, index) => ({
		symbol: "BTC/USDT",
		timeframe: "1h",
		timestamp: index * HOUR,
		open: close,
		high: close,
		low: close,
		close,
		volume: 1,
	}));

const settings: SimulationSettings = { ...DEFAULT_SIMULATION_SETTINGS };

const scripted = (signals: readonly TradeSignal[]): BoundStrategy => ({
	id: "ma_crossover",
	name: "scripted",
	params: {},
	label: "scripted",
	createSignal: () => (ctx) => ({
		signal: signals[ctx.index] ?? "HOLD",
		reason: "scripted",
	}),
});

describe("runSimulation", () => {
	it("enters on the golden cross and marks the open position to market", () => {
		const candles = buildCandles([100, 102, 101, 105, 103, 98, 107, 110]);
		const result = runSimulation({
			candles,
			strategy: bindStrategy(maCrossoverStrategy, { shortPeriod: 2, longPeriod: 4 }),
			settings,
		});

		expect(result.trades).toHaveLength(1);
		const [entry] = result.trades;
		expect(entry).toMatchObject({
			action: "BUY",
			price: 110,
			timestamp: 7 * HOUR,
			value: 175,
			cashBalance: 325,
			signalReason: "golden_cross",
		});
		expect(entry?.quantity).toBeCloseTo((175 / 110) * 0.999, 12);
		expect(entry?.fee).toBeCloseTo(0.175, 12);

		expect(result.metrics.tradeCount).toBe(0);
		expect(result.metrics.winRate).toBe(0);
		expect(result.metrics.returnPct).toBeCloseTo(-0.035, 9);
		expect(result.metrics.realizedReturnPct).toBe(0);
		expect(result.metrics.unrealizedPnl).toBeCloseTo(-0.175, 9);
		expect(result.metrics.maxDrawdownPct).toBeCloseTo(0.035, 9);
		expect(result.finalState.cash).toBe(325);
		expect(result.finalState.equity).toBeCloseTo(499.825, 9);
		expect(result.openPosition).toMatchObject({ entryPrice: 110, markPrice: 110 });
		expect(result.equityCurve).toHaveLength(candles.length);
		expect(result.split).toBe("full");
	});

	it("buys the RSI trough and sells the recovery exactly once each", () => {
		const closes = [
			...Array.from({ length: 15 }, () => 100),
			99,
			98,
			97,
			96,
			95,
			...Array.from({ length: 12 }, (_, i) => 96 + i),
		];
		const result = runSimulation({
			candles: buildCandles(closes),
			strategy: bindStrategy(rsiReversalStrategy, {
				period: 14,
				oversold: 30,
				overbought: 70,
			}),
			settings,
		});

		expect(result.trades.map((trade) => [trade.action, trade.price])).toEqual([
			["BUY", 99],
			["SELL", 105],
		]);
		expect(result.trades[0]?.timestamp).toBe(15 * HOUR);
		expect(result.trades[1]?.timestamp).toBe(29 * HOUR);
		expect(result.metrics.tradeCount).toBe(1);
		expect(result.metrics.winRate).toBe(1);
		expect(result.roundTrips[0]?.pnl).toBeCloseTo(
			((175 / 99) * 0.999 * 105) * 0.999 - 175,
			9
		);
		expect(result.openPosition).toBeNull();
	});

	it("lets a triggered stop replace the same-bar strategy decision", () => {
		const candles = buildCandles([100, 90, 95]);
		const result = runSimulation({
			candles,
			strategy: scripted(["BUY", "BUY", "BUY"]),
			settings,
		});
		expect(
			result.trades.map((trade) => [trade.action, trade.reason, trade.price])
		).toEqual([
			["BUY", "signal", 100],
			["SELL", "stop_loss", 90],
			["BUY", "signal", 95],
		]);
		expect(result.metrics.stopLossCount).toBe(1);
	});

	it("exits once on the stop when the strategy also sells that bar", () => {
		const result = runSimulation({
			candles: buildCandles([100, 90, 95]),
			strategy: scripted(["BUY", "SELL", "HOLD"]),
			settings,
		});
		expect(result.trades).toHaveLength(2);
		const exit = result.trades[1];
		expect(exit?.action).toBe("SELL");
		expect(exit?.reason).toBe("stop_loss");
		expect(exit?.price).toBe(90);
		expect(exit?.value).toBeCloseTo((175 / 100) * 0.999 * 90 * 0.999, 9);
		expect(result.trades.filter((trade) => trade.action === "SELL")).toHaveLength(1);
		expect(result.metrics.stopLossCount).toBe(1);
		expect(result.roundTrips).toHaveLength(1);
	});

	it("never holds more than one position", () => {
		const signals: TradeSignal[] = ["BUY", "BUY", "SELL", "SELL", "BUY", "HOLD", "BUY", "SELL"];
		const result = runSimulation({
			candles: buildCandles([100, 101, 102, 103, 104, 105, 106, 107]),
			strategy: scripted(signals),
			settings,
		});
		expect(result.trades.map((trade) => trade.action)).toEqual([
			"BUY",
			"SELL",
			"BUY",
			"SELL",
		]);
		for (const trade of result.trades) {
			expect(trade.assetBalance >= 0).toBe(true);
		}
	});

	it("is deterministic", () => {
		const candles = buildCandles([100, 102, 101, 105, 103, 98, 107, 110, 104, 99, 101]);
		const strategy = bindStrategy(maCrossoverStrategy, { shortPeriod: 2, longPeriod: 3 });
		const first = runSimulation({ candles, strategy, settings });
		const second = runSimulation({ candles, strategy, settings });
		expect(second.trades).toEqual(first.trades);
		expect(second.metrics).toEqual(first.metrics);
	});

	it("counts entries skipped for the minimum trade unit", () => {
		const result = runSimulation({
			candles: buildCandles([100, 100]),
			strategy: scripted(["BUY", "BUY"]),
			settings: { ...settings, minTradeUnit: 5 },
		});
		expect(result.trades).toHaveLength(0);
		expect(result.skippedEntries).toBe(2);
	});

	it("rejects an indicator cache built for another bar range", () => {
		const candles = buildCandles([100, 101, 102]);
		const shifted = candles.map((candle) => ({
			...candle,
			timestamp: candle.timestamp + HOUR,
		}));
		expect(() =>
			runSimulation({
				candles,
				strategy: scripted([]),
				settings,
				indicators: new IndicatorCache(shifted),
			})
		).toThrowError(
			new SimulationError("indicator cache covers range 3:3600000:10800000, expected 3:0:7200000")
		);
	});

	it("accepts an indicator cache built for the same bars", () => {
		const candles = buildCandles([100, 101, 102]);
		const result = runSimulation({
			candles,
			strategy: scripted(["BUY"]),
			settings,
			indicators: new IndicatorCache(candles),
		});
		expect(result.trades).toHaveLength(1);
	});

	it("rejects an empty bar list and invalid settings", () => {
		const strategy = scripted([]);
		expect(() => runSimulation({ candles: [], strategy, settings })).toThrowError(
			ConfigError
		);
		expect(() =>
			runSimulation({
				candles: buildCandles([1]),
				strategy,
				settings: { ...settings, startingCapital: -1 },
			})
		).toThrowError("simulation.startingCapital: must be positive, got -1");
	});
});
