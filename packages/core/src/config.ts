import fs from "node:fs";
import path from "node:path";

import { ConfigError } from "./errors";
import {
	DEFAULT_SIMULATION_SETTINGS,
	type SimulationSettings,
} from "./types";

export interface MarketConfig {
	exchange: string;
	symbol: string;
	timeframe: string;
	days: number;
}

/**
 * Either an explicit cutoff timestamp (first test bar is the first bar at or
 * after it) or the fraction of bars that go to the train window.
 */
export interface SplitConfig {
	cutoff?: number;
	trainRatio?: number;
}

/**
 * Parameter grid as written in the config file. Every field lists the values
 * to sweep; nested objects (trend filters) may themselves hold value lists.
 */
export type RawParameterGrid = Record<string, readonly unknown[]>;

export interface StrategySweepConfig {
	id: string;
	/** Omitted: the strategy's own default grid. */
	grid?: RawParameterGrid;
}

export interface SweepConfig {
	market: MarketConfig;
	simulation: SimulationSettings;
	split: SplitConfig;
	topN: number;
	concurrency: number;
	strategies: StrategySweepConfig[];
}

export const DEFAULT_TRAIN_RATIO = 0.75;
export const DEFAULT_TOP_N = 5;
export const DEFAULT_CONCURRENCY = 4;

const DEFAULT_MARKET: MarketConfig = {
	exchange: "binance",
	symbol: "BTC/USDT",
	timeframe: "1h",
	days: 365,
};

let cachedWorkspaceRoot: string | undefined;

const isWorkspaceManifest = (dir: string): boolean => {
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	try {
		const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
		return isRecord(parsed) && Array.isArray(parsed.workspaces);
	} catch (error) {
		throw new ConfigError(
			`unreadable package.json: ${error instanceof Error ? error.message : String(error)}`,
			manifest
		);
	}
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}
	let current = process.cwd();
	while (!isWorkspaceManifest(current) && !fs.existsSync(path.join(current, ".git"))) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}
	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const resolveSweepConfigPath = (explicit?: string): string => {
	const candidate = explicit ?? process.env.BACKLAB_SWEEP_CONFIG;
	if (candidate && candidate.trim().length) {
		return path.isAbsolute(candidate)
			? candidate
			: path.resolve(process.cwd(), candidate);
	}
	return path.join(findWorkspaceRoot(), "configs", "sweep.json");
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const ensureRecord = (
	value: unknown,
	field: string
): Record<string, unknown> => {
	if (!isRecord(value)) {
		throw new ConfigError("must be an object", field);
	}
	return value;
};

const ensureNumber = (
	value: unknown,
	field: string,
	fallback?: number
): number => {
	if (value === undefined && fallback !== undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigError(
			`required numeric field, got ${JSON.stringify(value) ?? "undefined"}`,
			field
		);
	}
	return value;
};

const ensurePositiveInteger = (
	value: unknown,
	field: string,
	fallback?: number
): number => {
	const parsed = ensureNumber(value, field, fallback);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new ConfigError(`must be a positive integer, got ${parsed}`, field);
	}
	return parsed;
};

const ensureString = (
	value: unknown,
	field: string,
	fallback?: string
): string => {
	if (value === undefined && fallback !== undefined) {
		return fallback;
	}
	if (typeof value !== "string" || !value.trim().length) {
		throw new ConfigError("must be a non-empty string", field);
	}
	return value.trim();
};

/**
 * Range checks for the capital and risk knobs. Shared by the config loader and
 * the simulation engine so both reject the same values.
 */
export const validateSimulationSettings = (
	settings: SimulationSettings,
	prefix = "simulation"
): SimulationSettings => {
	const {
		startingCapital,
		feeRate,
		positionSizePercent,
		minTradeUnit,
		stopLossPercent,
	} = settings;
	ensureNumber(startingCapital, `${prefix}.startingCapital`);
	if (startingCapital <= 0) {
		throw new ConfigError(
			`must be positive, got ${startingCapital}`,
			`${prefix}.startingCapital`
		);
	}
	ensureNumber(positionSizePercent, `${prefix}.positionSizePercent`);
	if (positionSizePercent <= 0 || positionSizePercent > 1) {
		throw new ConfigError(
			`must be in (0, 1], got ${positionSizePercent}`,
			`${prefix}.positionSizePercent`
		);
	}
	ensureNumber(feeRate, `${prefix}.feeRate`);
	if (feeRate < 0 || feeRate >= 1) {
		throw new ConfigError(`must be in [0, 1), got ${feeRate}`, `${prefix}.feeRate`);
	}
	ensureNumber(minTradeUnit, `${prefix}.minTradeUnit`);
	if (minTradeUnit < 0) {
		throw new ConfigError(
			`must not be negative, got ${minTradeUnit}`,
			`${prefix}.minTradeUnit`
		);
	}
	ensureNumber(stopLossPercent, `${prefix}.stopLossPercent`);
	if (stopLossPercent <= 0 || stopLossPercent >= 1) {
		throw new ConfigError(
			`must be in (0, 1), got ${stopLossPercent}`,
			`${prefix}.stopLossPercent`
		);
	}
	return settings;
};

const parseMarket = (raw: unknown): MarketConfig => {
	const file = raw === undefined ? {} : ensureRecord(raw, "market");
	return {
		exchange: ensureString(file.exchange, "market.exchange", DEFAULT_MARKET.exchange),
		symbol: ensureString(file.symbol, "market.symbol", DEFAULT_MARKET.symbol),
		timeframe: ensureString(
			file.timeframe,
			"market.timeframe",
			DEFAULT_MARKET.timeframe
		),
		days: ensurePositiveInteger(file.days, "market.days", DEFAULT_MARKET.days),
	};
};

const parseSimulation = (raw: unknown): SimulationSettings => {
	const file = raw === undefined ? {} : ensureRecord(raw, "simulation");
	const defaults = DEFAULT_SIMULATION_SETTINGS;
	return validateSimulationSettings({
		startingCapital: ensureNumber(
			file.startingCapital,
			"simulation.startingCapital",
			defaults.startingCapital
		),
		feeRate: ensureNumber(file.feeRate, "simulation.feeRate", defaults.feeRate),
		positionSizePercent: ensureNumber(
			file.positionSizePercent,
			"simulation.positionSizePercent",
			defaults.positionSizePercent
		),
		minTradeUnit: ensureNumber(
			file.minTradeUnit,
			"simulation.minTradeUnit",
			defaults.minTradeUnit
		),
		stopLossPercent: ensureNumber(
			file.stopLossPercent,
			"simulation.stopLossPercent",
			defaults.stopLossPercent
		),
	});
};

const parseSplit = (raw: unknown): SplitConfig => {
	if (raw === undefined) {
		return { trainRatio: DEFAULT_TRAIN_RATIO };
	}
	const file = ensureRecord(raw, "split");
	if (file.cutoff !== undefined && file.trainRatio !== undefined) {
		throw new ConfigError("set either cutoff or trainRatio, not both", "split");
	}
	if (file.cutoff !== undefined) {
		return { cutoff: ensureNumber(file.cutoff, "split.cutoff") };
	}
	const trainRatio = ensureNumber(
		file.trainRatio,
		"split.trainRatio",
		DEFAULT_TRAIN_RATIO
	);
	if (trainRatio <= 0 || trainRatio >= 1) {
		throw new ConfigError(
			`must be in (0, 1), got ${trainRatio}`,
			"split.trainRatio"
		);
	}
	return { trainRatio };
};

const parseGrid = (raw: unknown, field: string): RawParameterGrid => {
	const file = ensureRecord(raw, field);
	const grid: Record<string, readonly unknown[]> = {};
	const keys = Object.keys(file);
	if (!keys.length) {
		throw new ConfigError("must list at least one parameter", field);
	}
	for (const key of keys) {
		const values = file[key];
		if (!Array.isArray(values) || !values.length) {
			throw new ConfigError("must be a non-empty array", `${field}.${key}`);
		}
		grid[key] = values;
	}
	return grid;
};

const parseStrategies = (raw: unknown): StrategySweepConfig[] => {
	if (!Array.isArray(raw) || !raw.length) {
		throw new ConfigError("must be a non-empty array", "strategies");
	}
	return raw.map((entry, index) => {
		const field = `strategies[${index}]`;
		const file = ensureRecord(entry, field);
		return {
			id: ensureString(file.id, `${field}.id`),
			grid: file.grid === undefined ? undefined : parseGrid(file.grid, `${field}.grid`),
		};
	});
};

/**
 * Validates an already-parsed JSON document into a SweepConfig. Missing
 * sections fall back to the defaults; malformed ones raise ConfigError naming
 * the field path.
 */
export const parseSweepConfig = (raw: unknown): SweepConfig => {
	const file = ensureRecord(raw, "config");
	return {
		market: parseMarket(file.market),
		simulation: parseSimulation(file.simulation),
		split: parseSplit(file.split),
		topN: ensurePositiveInteger(file.topN, "topN", DEFAULT_TOP_N),
		concurrency: ensurePositiveInteger(
			file.concurrency,
			"concurrency",
			DEFAULT_CONCURRENCY
		),
		strategies: parseStrategies(file.strategies),
	};
};

export const loadSweepConfig = (configPath = resolveSweepConfigPath()): SweepConfig => {
	if (!fs.existsSync(configPath)) {
		throw new ConfigError(`config file not found at ${configPath}`);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (error) {
		throw new ConfigError(
			`invalid JSON in ${configPath}: ${error instanceof Error ? error.message : String(error)}`
		);
	}
	return parseSweepConfig(parsed);
};
