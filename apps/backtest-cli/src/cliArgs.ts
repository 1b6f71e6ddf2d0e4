import { ConfigError } from "@backlab/core";

export type ArgValue = string | boolean;

export const DEFAULT_OUTPUT_DIR = "output/sweeps";

export interface CliOptions {
	help: boolean;
	configPath?: string;
	days?: number;
	useCache: boolean;
	outputDir: string;
	concurrency?: number;
	topN?: number;
}

/** `--key value`, `--key=value`, bare `--flag` (true) and `--no-flag` (false). */
export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			throw new ConfigError(`unexpected argument "${token}"`, "argv");
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		if (key.startsWith("no-")) {
			args[key.slice(3)] = false;
			continue;
		}
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

const readString = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" || !value.length) {
		throw new ConfigError("expects a value", `--${key}`);
	}
	return value;
};

const readPositiveInteger = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const raw = readString(args, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`must be a positive integer, got ${raw}`, `--${key}`);
	}
	return value;
};

const readBoolean = (
	args: Record<string, ArgValue>,
	key: string,
	fallback: boolean
): boolean => {
	const value = args[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value === "boolean") {
		return value;
	}
	if (value === "true" || value === "false") {
		return value === "true";
	}
	throw new ConfigError(`must be true or false, got ${value}`, `--${key}`);
};

const KNOWN_OPTIONS = new Set([
	"help",
	"config",
	"days",
	"cache",
	"output",
	"concurrency",
	"topN",
]);

export const resolveCliOptions = (args: Record<string, ArgValue>): CliOptions => {
	const unknown = Object.keys(args).filter((key) => !KNOWN_OPTIONS.has(key));
	if (unknown.length) {
		throw new ConfigError(`unknown option --${unknown[0]}`, "argv");
	}
	return {
		help: readBoolean(args, "help", false),
		configPath: readString(args, "config"),
		days: readPositiveInteger(args, "days"),
		useCache: readBoolean(args, "cache", true),
		outputDir: readString(args, "output") ?? DEFAULT_OUTPUT_DIR,
		concurrency: readPositiveInteger(args, "concurrency"),
		topN: readPositiveInteger(args, "topN"),
	};
};
