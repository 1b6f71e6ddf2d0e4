/**
 * Raised when the inputs handed to a simulation disagree with each other,
 * such as an indicator cache built for a different bar range.
 */
export class SimulationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "SimulationError";
	}
}
