#!/usr/bin/env node

import path from "node:path";
import process from "node:process";
import {
	createLogger,
	getWorkspaceRoot,
	loadEnvFiles,
	loadSweepConfig,
	resolveSweepConfigPath,
	type SweepConfig,
} from "@backlab/core";
import { CcxtMarketDataClient } from "@backlab/data";
import { listStrategies } from "@backlab/strategy-engine";
import { type CliOptions, parseCliArgs, resolveCliOptions } from "./cliArgs";
import { cacheFileName, runSweepCommand } from "./sweepCommand";

const logger = createLogger("backtest-cli");

const USAGE = `Usage:
  npm run sweep -- [options]

Options:
  --config <path>          Sweep config JSON (default configs/sweep.json or BACKLAB_SWEEP_CONFIG)
  --days <n>               Days of bars to load, overrides market.days
  --cache / --no-cache     Reuse the bar cache under data/ (default on)
  --output <dir>           Output directory (default output/sweeps)
  --concurrency <n>        Simulations in flight at once
  --topN <n>               Rows per ranked table
  --help                   Show this message

Strategies: ${listStrategies()
	.map((manifest) => manifest.strategyId)
	.join(", ")}
`;

const applyOverrides = (config: SweepConfig, options: CliOptions): SweepConfig => ({
	...config,
	market: { ...config.market, days: options.days ?? config.market.days },
	topN: options.topN ?? config.topN,
	concurrency: options.concurrency ?? config.concurrency,
});

const main = async (): Promise<void> => {
	const options = resolveCliOptions(parseCliArgs(process.argv.slice(2)));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const root = getWorkspaceRoot();
	const envFiles = loadEnvFiles(root);
	const configPath = resolveSweepConfigPath(options.configPath);
	const config = applyOverrides(loadSweepConfig(configPath), options);
	logger.info("backtest_cli_started", {
		configPath,
		envFiles,
		market: config.market,
		strategies: config.strategies.map((entry) => entry.id),
	});

	const controller = new AbortController();
	process.once("SIGINT", () => {
		logger.warn("backtest_cli_interrupted");
		controller.abort();
	});

	const now = Date.now();
	const runStamp = new Date(now).toISOString().replace(/[:.]/g, "-");
	const outputDir = path.resolve(process.cwd(), options.outputDir, runStamp);
	const { files } = await runSweepCommand({
		config,
		client: CcxtMarketDataClient.create(config.market.exchange),
		outputDir,
		now,
		cachePath: path.join(root, "data", cacheFileName(config.market)),
		useCache: options.useCache,
		signal: controller.signal,
	});
	console.log(`Results written to ${path.relative(process.cwd(), outputDir) || outputDir}`);
	logger.info("backtest_cli_finished", { files });
};

main().catch((error: unknown) => {
	logger.error("backtest_cli_failed", {
		error: error instanceof Error ? error.message : String(error),
		name: error instanceof Error ? error.name : undefined,
	});
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
