import { ConfigError, timeframeToMs } from "@backlab/core";
import type { IndicatorProvider } from "@backlab/indicators";
import { readNumber, readPercentLevel, readPeriod, readString } from "../../params";
import type { SignalContext } from "../../types";
import type { TrendFilter } from "./config";

export type TrendPredicate = (ctx: SignalContext) => boolean;

const FILTER_FIELD = "params.filter";

export const parseTrendFilter = (raw: Record<string, unknown>): TrendFilter => {
	const mode = raw.mode;
	switch (mode) {
		case "atr": {
			const multiplier = readNumber(raw, "multiplier", FILTER_FIELD);
			if (multiplier <= 0) {
				throw new ConfigError(
					`must be positive, got ${multiplier}`,
					`${FILTER_FIELD}.multiplier`
				);
			}
			return {
				mode: "atr",
				atrPeriod: readPeriod(raw, "atrPeriod", FILTER_FIELD),
				averagePeriod: readPeriod(raw, "averagePeriod", FILTER_FIELD),
				multiplier,
			};
		}
		case "adx":
			return {
				mode: "adx",
				adxPeriod: readPeriod(raw, "adxPeriod", FILTER_FIELD),
				threshold: readPercentLevel(raw, "threshold", FILTER_FIELD),
			};
		case "higher_timeframe": {
			const timeframe = readString(raw, "timeframe", FILTER_FIELD);
			timeframeToMs(timeframe);
			return {
				mode: "higher_timeframe",
				timeframe,
				shortPeriod: readPeriod(raw, "shortPeriod", FILTER_FIELD),
				longPeriod: readPeriod(raw, "longPeriod", FILTER_FIELD),
			};
		}
		default:
			throw new ConfigError(
				`unknown filter mode ${JSON.stringify(mode) ?? "undefined"}`,
				`${FILTER_FIELD}.mode`
			);
	}
};

export const describeTrendFilter = (filter: TrendFilter): string => {
	switch (filter.mode) {
		case "atr":
			return `ATR(${filter.atrPeriod})>SMA${filter.averagePeriod}x${filter.multiplier}`;
		case "adx":
			return `ADX(${filter.adxPeriod})>${filter.threshold}`;
		case "higher_timeframe":
			return `${filter.timeframe} SMA(${filter.shortPeriod}/${filter.longPeriod})`;
	}
};

/**
 * Builds the entry gate. A null input on the current bar means the trend is
 * not confirmed.
 */
export const createTrendPredicate = (
	filter: TrendFilter,
	indicators: IndicatorProvider
): TrendPredicate => {
	switch (filter.mode) {
		case "atr": {
			const atr = indicators.atr(filter.atrPeriod);
			const average = indicators.atrAverage(filter.atrPeriod, filter.averagePeriod);
			return (ctx) => {
				const current = ctx.value(atr);
				const baseline = ctx.value(average);
				return (
					current !== null &&
					baseline !== null &&
					current > baseline * filter.multiplier
				);
			};
		}
		case "adx": {
			const adx = indicators.adx(filter.adxPeriod);
			return (ctx) => {
				const current = ctx.value(adx);
				return current !== null && current > filter.threshold;
			};
		}
		case "higher_timeframe": {
			const short = indicators.higherTimeframeSma(filter.timeframe, filter.shortPeriod);
			const long = indicators.higherTimeframeSma(filter.timeframe, filter.longPeriod);
			return (ctx) => {
				const shortValue = ctx.value(short);
				const longValue = ctx.value(long);
				return shortValue !== null && longValue !== null && shortValue > longValue;
			};
		}
	}
};
