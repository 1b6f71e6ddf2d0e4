import type { Candle } from "@backlab/core";

export class DataValidationError extends Error {
	constructor(
		message: string,
		readonly index?: number
	) {
		super(index === undefined ? message : `candle[${index}]: ${message}`);
		this.name = "DataValidationError";
	}
}

export const isDataValidationError = (
	value: unknown
): value is DataValidationError => value instanceof DataValidationError;

const isPositive = (value: number): boolean => Number.isFinite(value) && value > 0;

/**
 * Checks a bar series before it is simulated: strictly increasing timestamps,
 * positive prices, high at or above low and non-negative volume.
 */
export const assertCandleSeries = (candles: readonly Candle[]): void => {
	candles.forEach((candle, index) => {
		if (!Number.isFinite(candle.timestamp)) {
			throw new DataValidationError(`timestamp is not a number`, index);
		}
		if (index > 0 && candle.timestamp <= candles[index - 1].timestamp) {
			throw new DataValidationError(
				`timestamp ${candle.timestamp} does not follow ${candles[index - 1].timestamp}`,
				index
			);
		}
		for (const field of ["open", "high", "low", "close"] as const) {
			if (!isPositive(candle[field])) {
				throw new DataValidationError(`${field} must be positive, got ${candle[field]}`, index);
			}
		}
		if (candle.high < candle.low) {
			throw new DataValidationError(
				`high ${candle.high} is below low ${candle.low}`,
				index
			);
		}
		if (!(Number.isFinite(candle.volume) && candle.volume >= 0)) {
			throw new DataValidationError(
				`volume must be non-negative, got ${candle.volume}`,
				index
			);
		}
	});
};
