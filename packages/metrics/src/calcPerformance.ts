import type { Trade } from "@backlab/core";
import { buildRoundTrips } from "./roundTrips";
import type {
	DrawdownSpan,
	EquityPoint,
	RoundTrip,
	SimulationMetrics,
} from "./metricsSchema";

export interface CalculateMetricsInput {
	trades: readonly Trade[];
	equityCurve: readonly EquityPoint[];
	startingCapital: number;
	/** Cash plus holdings at the last close. */
	finalEquity: number;
	/** Cash plus the cost basis of any open position. */
	realizedEquity: number;
}

export interface EquityAnalysis {
	drawdowns: DrawdownSpan[];
	maxDrawdown: number;
	maxDrawdownPct: number;
}

export interface PerformanceReport {
	metrics: SimulationMetrics;
	roundTrips: RoundTrip[];
	drawdowns: DrawdownSpan[];
}

export const calculatePerformance = (
	input: CalculateMetricsInput
): PerformanceReport => {
	const { trades, equityCurve, startingCapital, finalEquity, realizedEquity } =
		input;
	const roundTrips = buildRoundTrips(trades);

	const grossProfit = roundTrips
		.filter((trip) => trip.pnl > 0)
		.reduce((sum, trip) => sum + trip.pnl, 0);
	const grossLoss = roundTrips
		.filter((trip) => trip.pnl < 0)
		.reduce((sum, trip) => sum + Math.abs(trip.pnl), 0);
	const tradeCount = roundTrips.length;
	const wins = roundTrips.filter((trip) => trip.isWin).length;
	const { drawdowns, maxDrawdown, maxDrawdownPct } = analyzeEquityCurve(
		equityCurve,
		startingCapital
	);

	const metrics: SimulationMetrics = {
		returnPct: toPercent(finalEquity, startingCapital),
		realizedReturnPct: toPercent(realizedEquity, startingCapital),
		winRate: tradeCount ? wins / tradeCount : 0,
		tradeCount,
		maxDrawdown,
		maxDrawdownPct,
		grossProfit,
		grossLoss,
		profitFactor: computeProfitFactor(grossProfit, grossLoss),
		netProfit: finalEquity - startingCapital,
		finalEquity,
		unrealizedPnl: finalEquity - realizedEquity,
		stopLossCount: roundTrips.filter((trip) => trip.exitReason === "stop_loss")
			.length,
		avgTradeReturnPct: tradeCount
			? roundTrips.reduce((sum, trip) => sum + trip.returnPct, 0) / tradeCount
			: 0,
	};

	return { metrics, roundTrips, drawdowns };
};

export const calculateMetrics = (
	input: CalculateMetricsInput
): SimulationMetrics => calculatePerformance(input).metrics;

const toPercent = (equity: number, startingCapital: number): number =>
	((equity - startingCapital) / startingCapital) * 100;

const computeProfitFactor = (grossProfit: number, grossLoss: number): number => {
	if (grossLoss > 0) {
		return grossProfit / grossLoss;
	}
	return grossProfit > 0 ? Number.POSITIVE_INFINITY : 0;
};

/**
 * Walks the equity curve from the starting capital and records every
 * peak-to-trough span. Depths are reported in currency and in percent of the
 * peak.
 */
export const analyzeEquityCurve = (
	curve: readonly EquityPoint[],
	startingCapital: number
): EquityAnalysis => {
	const drawdowns: DrawdownSpan[] = [];
	let peakEquity = startingCapital;
	let peakTimestamp: number | null = null;
	let maxDrawdown = 0;
	let maxDrawdownPct = 0;
	let activeSpan: {
		peakTimestamp: number | null;
		peakEquity: number;
		troughTimestamp: number;
		troughEquity: number;
	} | null = null;

	for (const point of curve) {
		if (point.equity > peakEquity) {
			if (activeSpan) {
				finalizeDrawdown(drawdowns, activeSpan, point.timestamp);
				activeSpan = null;
			}
			peakEquity = point.equity;
			peakTimestamp = point.timestamp;
			continue;
		}

		if (point.equity === peakEquity) {
			continue;
		}

		if (!activeSpan) {
			activeSpan = {
				peakTimestamp,
				peakEquity,
				troughTimestamp: point.timestamp,
				troughEquity: point.equity,
			};
		} else if (point.equity < activeSpan.troughEquity) {
			activeSpan.troughEquity = point.equity;
			activeSpan.troughTimestamp = point.timestamp;
		}

		const depth = peakEquity - point.equity;
		const depthPct = peakEquity > 0 ? (depth / peakEquity) * 100 : 0;
		if (depthPct > maxDrawdownPct) {
			maxDrawdownPct = depthPct;
		}
		if (depth > maxDrawdown) {
			maxDrawdown = depth;
		}
	}

	if (activeSpan) {
		finalizeDrawdown(drawdowns, activeSpan, null);
	}

	return { drawdowns, maxDrawdown, maxDrawdownPct };
};

const finalizeDrawdown = (
	drawdowns: DrawdownSpan[],
	span: {
		peakTimestamp: number | null;
		peakEquity: number;
		troughTimestamp: number;
		troughEquity: number;
	},
	recoveryTimestamp: number | null
): void => {
	const depth = span.peakEquity - span.troughEquity;
	const depthPct = span.peakEquity > 0 ? (depth / span.peakEquity) * 100 : 0;
	drawdowns.push({
		peakTimestamp: span.peakTimestamp,
		troughTimestamp: span.troughTimestamp,
		recoveryTimestamp,
		depth,
		depthPct,
		durationMs:
			span.peakTimestamp !== null
				? span.troughTimestamp - span.peakTimestamp
				: null,
		recoveryMs:
			recoveryTimestamp !== null && span.peakTimestamp !== null
				? recoveryTimestamp - span.peakTimestamp
				: null,
	});
};
