import type { TradeReason } from "@backlab/core";

export interface EquityPoint {
	timestamp: number;
	equity: number;
}

export interface DrawdownSpan {
	peakTimestamp: number | null;
	troughTimestamp: number | null;
	recoveryTimestamp: number | null;
	depth: number;
	/** Percent of the peak, 0..100. */
	depthPct: number;
	durationMs: number | null;
	recoveryMs: number | null;
}

export interface RoundTrip {
	entryTimestamp: number;
	exitTimestamp: number;
	entryPrice: number;
	exitPrice: number;
	quantity: number;
	/** Cash spent on entry, fee included. */
	costBasis: number;
	/** Cash received on exit, fee deducted. */
	proceeds: number;
	pnl: number;
	returnPct: number;
	durationMs: number;
	exitReason: TradeReason;
	isWin: boolean;
}

export interface SimulationMetrics {
	/** Mark-to-market return of the whole run, percent. */
	returnPct: number;
	/** Return with any open position carried at its cost basis, percent. */
	realizedReturnPct: number;
	/** Winning round trips over all round trips, 0..1. */
	winRate: number;
	/** Completed round trips. */
	tradeCount: number;
	maxDrawdown: number;
	maxDrawdownPct: number;
	grossProfit: number;
	grossLoss: number;
	profitFactor: number;
	netProfit: number;
	finalEquity: number;
	unrealizedPnl: number;
	stopLossCount: number;
	avgTradeReturnPct: number;
}
