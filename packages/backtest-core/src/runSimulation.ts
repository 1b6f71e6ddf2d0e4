import {
	ConfigError,
	createLogger,
	validateSimulationSettings,
	type Trade,
} from "@backlab/core";
import { buildRangeKey, IndicatorCache } from "@backlab/indicators";
import { calculatePerformance, type EquityPoint } from "@backlab/metrics";
import { PositionTracker } from "@backlab/risk-engine";
import { createSignalContext } from "@backlab/strategy-engine";
import type { SimulationInput, SimulationResult } from "./backtestTypes";
import { SimulationError } from "./errors";

const logger = createLogger("backtest-core");

/**
 * Replays the bars in order against one bound strategy. Per bar: a held
 * position is checked against its stop first, and a triggered stop replaces
 * the strategy's decision for that bar; otherwise the signal is applied. The
 * equity curve gets one point per bar. Positions still open at the end stay
 * open and are marked to the last close.
 */
export const runSimulation = (input: SimulationInput): SimulationResult => {
	const { candles, strategy, settings } = input;
	const split = input.split ?? "full";
	if (!candles.length) {
		throw new ConfigError("no candles to simulate", "candles");
	}
	validateSimulationSettings(settings);

	const indicators = input.indicators ?? new IndicatorCache(candles);
	const rangeKey = buildRangeKey(candles);
	if (indicators.rangeKey !== rangeKey) {
		throw new SimulationError(
			`indicator cache covers range ${indicators.rangeKey}, expected ${rangeKey}`
		);
	}
	const signal = strategy.createSignal(indicators);
	const tracker = new PositionTracker(settings, settings.startingCapital);
	const trades: Trade[] = [];
	const equityCurve: EquityPoint[] = [];
	let skippedEntries = 0;

	for (let index = 0; index < candles.length; index += 1) {
		const candle = candles[index];

		if (tracker.checkStopLoss(candle)) {
			const outcome = tracker.stopOut(candle);
			if (outcome.kind === "executed") {
				trades.push(outcome.trade);
			}
		} else {
			const decision = signal(createSignalContext(candles, index));
			const outcome = tracker.apply(decision, candle);
			if (outcome.kind === "executed") {
				trades.push(outcome.trade);
			} else if (
				outcome.reason === "insufficient_capital" ||
				outcome.reason === "below_min_trade_unit"
			) {
				skippedEntries += 1;
				logger.debug("buy_skipped", {
					strategyId: strategy.id,
					params: strategy.label,
					timestamp: candle.timestamp,
					reason: outcome.reason,
					...(outcome.detail ?? {}),
				});
			}
		}

		equityCurve.push({
			timestamp: candle.timestamp,
			equity: tracker.snapshot(candle.close).equity,
		});
	}

	const lastClose = candles[candles.length - 1].close;
	const finalState = tracker.snapshot(lastClose);
	const openPosition = tracker.openPositionReport(lastClose);
	const realizedEquity = finalState.cash + (openPosition?.costBasis ?? 0);
	const { metrics, roundTrips } = calculatePerformance({
		trades,
		equityCurve,
		startingCapital: settings.startingCapital,
		finalEquity: finalState.equity,
		realizedEquity,
	});

	logger.debug("simulation_complete", {
		strategyId: strategy.id,
		params: strategy.label,
		split,
		candles: candles.length,
		trades: trades.length,
		returnPct: metrics.returnPct,
	});

	return {
		strategyId: strategy.id,
		strategyName: strategy.name,
		params: strategy.params,
		paramsLabel: strategy.label,
		split,
		trades: Object.freeze(trades),
		roundTrips,
		finalState,
		openPosition,
		metrics,
		equityCurve,
		skippedEntries,
	};
};
