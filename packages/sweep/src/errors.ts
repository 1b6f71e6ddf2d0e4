export class SweepCancelledError extends Error {
	constructor(
		readonly completed: number,
		readonly total: number
	) {
		super(`Sweep cancelled after ${completed} of ${total} runs`);
		this.name = "SweepCancelledError";
	}
}

export const isSweepCancelledError = (
	value: unknown
): value is SweepCancelledError => value instanceof SweepCancelledError;
