import type { Trade } from "@backlab/core";
import { formatTimestamp } from "@backlab/core";
import type { SimulationMetrics } from "./metricsSchema";

/** Stand-in written for an unbounded profit factor (wins and no losses). */
export const INFINITE_PROFIT_FACTOR = 9999;

export interface ResultSummary {
	strategyId: string;
	label: string;
	split: string;
	params: Readonly<Record<string, unknown>>;
	metrics: SimulationMetrics;
}

export const buildSummaryRow = (
	summary: ResultSummary,
	rank?: number
): Record<string, unknown> => ({
	...(rank !== undefined ? { rank } : {}),
	strategyId: summary.strategyId,
	label: summary.label,
	split: summary.split,
	...flattenParams(summary.params),
	returnPct: round(summary.metrics.returnPct),
	realizedReturnPct: round(summary.metrics.realizedReturnPct),
	winRate: round(summary.metrics.winRate, 4),
	tradeCount: summary.metrics.tradeCount,
	maxDrawdownPct: round(summary.metrics.maxDrawdownPct),
	profitFactor: Number.isFinite(summary.metrics.profitFactor)
		? round(summary.metrics.profitFactor)
		: INFINITE_PROFIT_FACTOR,
	stopLossCount: summary.metrics.stopLossCount,
	netProfit: round(summary.metrics.netProfit),
	finalEquity: round(summary.metrics.finalEquity),
	unrealizedPnl: round(summary.metrics.unrealizedPnl),
});

export const formatResultsCsv = (rows: readonly Record<string, unknown>[]): string =>
	toCsv(rows);

export const formatTradesCsv = (trades: readonly Trade[]): string =>
	toCsv(
		trades.map((trade) => ({
			timestamp: trade.timestamp,
			datetime: formatTimestamp(trade.timestamp),
			action: trade.action,
			price: trade.price,
			quantity: trade.quantity,
			fee: trade.fee,
			value: trade.value,
			cashBalance: trade.cashBalance,
			assetBalance: trade.assetBalance,
			reason: trade.reason,
			signalReason: trade.signalReason,
		}))
	);

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/** Nested parameter objects become dotted columns: `filter.mode`, `filter.adxPeriod`. */
export const flattenParams = (
	params: Readonly<Record<string, unknown>>,
	prefix = ""
): Record<string, unknown> => {
	const flat: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(params)) {
		const column = prefix ? `${prefix}.${key}` : key;
		if (isRecord(value)) {
			Object.assign(flat, flattenParams(value, column));
		} else {
			flat[column] = value;
		}
	}
	return flat;
};

const round = (value: number, digits = 2): number => {
	const factor = 10 ** digits;
	return Math.round(value * factor) / factor;
};

/**
 * Header comes from the union of row keys in first-seen order, so rows for
 * different strategies can share one file.
 */
const toCsv = (rows: readonly Record<string, unknown>[]): string => {
	if (!rows.length) {
		return "";
	}
	const headers: string[] = [];
	for (const row of rows) {
		for (const key of Object.keys(row)) {
			if (!headers.includes(key)) {
				headers.push(key);
			}
		}
	}
	const lines = [headers.map(formatValue).join(",")];
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return `${lines.join("\n")}\n`;
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (/[",\n]/.test(value)) {
			return `"${value.replace(/"/g, '""')}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		if (value === Number.POSITIVE_INFINITY) {
			return String(INFINITE_PROFIT_FACTOR);
		}
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
