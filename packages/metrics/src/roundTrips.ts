import type { Trade } from "@backlab/core";
import type { RoundTrip } from "./metricsSchema";

/**
 * Pairs each BUY with the SELL that follows it. A trailing BUY without an
 * exit is an open position and produces no round trip.
 */
export const buildRoundTrips = (trades: readonly Trade[]): RoundTrip[] => {
	const roundTrips: RoundTrip[] = [];
	let entry: Trade | null = null;

	for (const trade of trades) {
		if (trade.action === "BUY") {
			entry = trade;
			continue;
		}
		if (!entry) {
			continue;
		}
		const pnl = trade.value - entry.value;
		roundTrips.push({
			entryTimestamp: entry.timestamp,
			exitTimestamp: trade.timestamp,
			entryPrice: entry.price,
			exitPrice: trade.price,
			quantity: entry.quantity,
			costBasis: entry.value,
			proceeds: trade.value,
			pnl,
			returnPct: entry.value > 0 ? (pnl / entry.value) * 100 : 0,
			durationMs: Math.max(trade.timestamp - entry.timestamp, 0),
			exitReason: trade.reason,
			isWin: pnl > 0,
		});
		entry = null;
	}

	return roundTrips;
};
