import { assertPositiveInteger } from "@backlab/core";

export const assertPeriod = (period: number, field = "period"): void => {
	assertPositiveInteger(period, field);
};

/** Arithmetic mean of `values[end - period + 1 .. end]`, or null if any entry is null. */
export const windowMean = (
	values: ReadonlyArray<number | null>,
	end: number,
	period: number
): number | null => {
	const start = end - period + 1;
	if (start < 0) {
		return null;
	}
	let sum = 0;
	for (let i = start; i <= end; i += 1) {
		const value = values[i];
		if (value === null || value === undefined) {
			return null;
		}
		sum += value;
	}
	return sum / period;
};
