/**
 * Raised for invalid static configuration (bad periods, thresholds, capital,
 * grids, unknown strategy ids). Always thrown before a simulation starts.
 */
export class ConfigError extends Error {
	readonly field?: string;

	constructor(message: string, field?: string) {
		super(field ? `${field}: ${message}` : message);
		this.name = "ConfigError";
		this.field = field;
	}
}

export const isConfigError = (value: unknown): value is ConfigError =>
	value instanceof ConfigError;

export const assertPositiveInteger = (value: number, field: string): void => {
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`must be a positive integer, got ${value}`, field);
	}
};

export const assertFiniteNumber = (value: number, field: string): void => {
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigError(`must be a finite number, got ${value}`, field);
	}
};
