import { ConfigError } from "@backlab/core";
import { maCrossoverStrategy } from "./strategies/ma-crossover";
import { rsiReversalStrategy } from "./strategies/rsi-reversal";
import { trendFilteredCrossoverStrategy } from "./strategies/trend-filtered-crossover";
import type {
	AnyStrategyVariant,
	BoundStrategy,
	StrategyId,
	StrategyManifest,
	StrategyParams,
	StrategyVariant,
} from "./types";

export const strategyRegistry: readonly AnyStrategyVariant[] = Object.freeze([
	maCrossoverStrategy,
	rsiReversalStrategy,
	trendFilteredCrossoverStrategy,
]);

const registryMap = new Map<string, AnyStrategyVariant>(
	strategyRegistry.map((variant) => [variant.id, variant])
);

export const isStrategyId = (value: string): value is StrategyId =>
	registryMap.has(value);

export const getStrategy = (id: string): AnyStrategyVariant => {
	const variant = registryMap.get(id);
	if (!variant) {
		const known = strategyRegistry.map((entry) => entry.id).join(", ");
		throw new ConfigError(`Unknown strategy id "${id}" (known: ${known})`, "strategy.id");
	}
	return variant;
};

export const listStrategies = (): StrategyManifest[] =>
	strategyRegistry.map((variant) => variant.manifest);

/**
 * Pairs a variant with parameters that already passed `parseParams`. The
 * caller is responsible for the viability check.
 */
export const bindParsedStrategy = <TParams extends StrategyParams>(
	variant: StrategyVariant<TParams>,
	params: TParams
): BoundStrategy => {
	const frozen = Object.freeze({ ...params });
	return Object.freeze({
		id: variant.id,
		name: variant.manifest.name,
		params: frozen,
		label: variant.label(params),
		createSignal: (indicators) => variant.createSignal(params, indicators),
	} satisfies BoundStrategy);
};

/** Parses, validates and binds. Non-viable parameters are a ConfigError here. */
export const bindStrategy = <TParams extends StrategyParams>(
	variant: StrategyVariant<TParams>,
	raw: StrategyParams
): BoundStrategy => {
	const params = variant.parseParams(raw);
	const issue = variant.viabilityIssue(params);
	if (issue) {
		throw new ConfigError(issue, "params");
	}
	return bindParsedStrategy(variant, params);
};
