import { ConfigError, type RawParameterGrid } from "@backlab/core";
import type { StrategyParams } from "@backlab/strategy-engine";

export type ParameterGrid<V> = Readonly<Record<string, readonly V[]>>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Full cross product of the grid. Keys vary in declaration order with the
 * first key slowest, so the output order is stable for a given grid.
 */
export const expandGrid = <V>(
	grid: ParameterGrid<V>,
	field = "grid"
): Array<Record<string, V>> => {
	const keys = Object.keys(grid);
	if (!keys.length) {
		throw new ConfigError("must list at least one parameter", field);
	}
	let combinations: Array<Record<string, V>> = [{}];
	for (const key of keys) {
		const values = grid[key];
		if (!values.length) {
			throw new ConfigError("must list at least one value", `${field}.${key}`);
		}
		const next: Array<Record<string, V>> = [];
		for (const combination of combinations) {
			for (const value of values) {
				next.push({ ...combination, [key]: value });
			}
		}
		combinations = next;
	}
	return combinations;
};

/**
 * Expands an object whose fields may be value lists into every concrete
 * object. Scalar fields are kept as a single value.
 */
const expandNested = (
	value: Record<string, unknown>,
	field: string
): Array<Record<string, unknown>> => {
	const lists: Record<string, readonly unknown[]> = {};
	for (const [key, entry] of Object.entries(value)) {
		lists[key] = Array.isArray(entry) ? entry : [entry];
	}
	return expandGrid(lists, field);
};

/**
 * Expands a grid as written in config files. List entries that are objects
 * (trend filters) may carry their own value lists and are expanded first.
 */
export const expandRawGrid = (
	raw: RawParameterGrid,
	field = "grid"
): StrategyParams[] => {
	const grid: Record<string, readonly unknown[]> = {};
	for (const [key, values] of Object.entries(raw)) {
		const expanded: unknown[] = [];
		values.forEach((value, index) => {
			if (isRecord(value)) {
				expanded.push(...expandNested(value, `${field}.${key}[${index}]`));
			} else {
				expanded.push(value);
			}
		});
		grid[key] = expanded;
	}
	return expandGrid(grid, field);
};
