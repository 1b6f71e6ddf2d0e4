import { ConfigError, stableStringify } from "@backlab/core";
import type { StrategyParams } from "./types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const readRecord = (
	raw: StrategyParams,
	key: string,
	prefix = "params"
): Record<string, unknown> => {
	const value = raw[key];
	if (!isRecord(value)) {
		throw new ConfigError("must be an object", `${prefix}.${key}`);
	}
	return value;
};

export const readNumber = (
	raw: StrategyParams,
	key: string,
	prefix = "params"
): number => {
	const value = raw[key];
	if (value === undefined) {
		throw new ConfigError("is required", `${prefix}.${key}`);
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigError(
			`must be a finite number, got ${stableStringify(value)}`,
			`${prefix}.${key}`
		);
	}
	return value;
};

export const readPeriod = (
	raw: StrategyParams,
	key: string,
	prefix = "params"
): number => {
	const value = readNumber(raw, key, prefix);
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigError(
			`must be a positive integer, got ${value}`,
			`${prefix}.${key}`
		);
	}
	return value;
};

export const readString = (
	raw: StrategyParams,
	key: string,
	prefix = "params"
): string => {
	const value = raw[key];
	if (typeof value !== "string" || !value.length) {
		throw new ConfigError("must be a non-empty string", `${prefix}.${key}`);
	}
	return value;
};

export const readPercentLevel = (
	raw: StrategyParams,
	key: string,
	prefix = "params"
): number => {
	const value = readNumber(raw, key, prefix);
	if (value < 0 || value > 100) {
		throw new ConfigError(`must be within [0, 100], got ${value}`, `${prefix}.${key}`);
	}
	return value;
};
