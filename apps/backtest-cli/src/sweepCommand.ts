import fs from "node:fs";
import path from "node:path";
import {
	DAY_MS,
	createLogger,
	formatTimestamp,
	hashJson,
	summarizeCandles,
	type Candle,
	type SweepConfig,
} from "@backlab/core";
import {
	assertCandleSeries,
	fetchHistoricalCandles,
	loadCandlesWithCache,
	type MarketDataClient,
} from "@backlab/data";
import {
	buildSummaryRow,
	flattenParams,
	formatResultsCsv,
	formatTradesCsv,
} from "@backlab/metrics";
import { getStrategy } from "@backlab/strategy-engine";
import {
	runSweep,
	type OverfittingRow,
	type RankedReport,
	type StrategyComparisonRow,
	type SweepReport,
} from "@backlab/sweep";

const logger = createLogger("backtest-cli");

export interface SweepCommandInput {
	config: SweepConfig;
	client: MarketDataClient;
	outputDir: string;
	now: number;
	/** Bar cache file; bars are always fetched when omitted. */
	cachePath?: string;
	useCache?: boolean;
	signal?: AbortSignal;
}

export interface SweepCommandResult {
	report: SweepReport;
	files: string[];
	configFingerprint: string;
}

export const cacheFileName = (config: SweepConfig["market"]): string =>
	`${config.exchange}-${config.symbol.replace(/[\\/]/g, "")}-${config.timeframe}.csv`;

const loadCandles = async (input: SweepCommandInput): Promise<Candle[]> => {
	const { market } = input.config;
	if (input.cachePath) {
		const { candles, source } = await loadCandlesWithCache({
			client: input.client,
			symbol: market.symbol,
			timeframe: market.timeframe,
			days: market.days,
			now: input.now,
			cachePath: input.cachePath,
			useCache: input.useCache,
			logger,
		});
		logger.info("candles_loaded", { source, candles: candles.length });
		return candles;
	}
	const candles = await fetchHistoricalCandles({
		client: input.client,
		symbol: market.symbol,
		timeframe: market.timeframe,
		startTimestamp: input.now - market.days * DAY_MS,
		endTimestamp: input.now,
		logger,
	});
	assertCandleSeries(candles);
	logger.info("candles_loaded", { source: "exchange", candles: candles.length });
	return candles;
};

const rankedRows = (ranked: RankedReport): Record<string, unknown>[] =>
	ranked.entries.map(({ rank, result }) =>
		buildSummaryRow(
			{
				strategyId: result.strategyId,
				label: result.paramsLabel,
				split: result.split,
				params: result.params,
				metrics: result.metrics,
			},
			rank
		)
	);

const comparisonRows = (rows: readonly StrategyComparisonRow[]): Record<string, unknown>[] =>
	rows.map((row) => ({
		strategyId: row.strategyId,
		label: row.paramsLabel,
		...flattenParams(row.params),
		trainReturnPct: round(row.trainMetrics.returnPct),
		testReturnPct: round(row.testMetrics.returnPct),
		testTradeCount: row.testMetrics.tradeCount,
		testWinRate: round(row.testMetrics.winRate, 4),
		testMaxDrawdownPct: round(row.testMetrics.maxDrawdownPct),
	}));

const overfittingRows = (rows: readonly OverfittingRow[]): Record<string, unknown>[] =>
	rows.map((row) => ({
		strategyId: row.strategyId,
		label: row.paramsLabel,
		trainReturnPct: round(row.trainReturnPct),
		testReturnPct: round(row.testReturnPct),
		gapPct: round(row.gapPct),
		overfit: row.overfit,
	}));

const round = (value: number, digits = 2): number => {
	const factor = 10 ** digits;
	return Math.round(value * factor) / factor;
};

const writeFile = (outputDir: string, name: string, contents: string): string => {
	const filePath = path.join(outputDir, name);
	fs.writeFileSync(filePath, contents);
	return filePath;
};

/**
 * Loads bars for the configured market, runs the sweep, logs the ranked
 * tables and writes one CSV per (strategy, window) plus the comparison files.
 * The `full` CSV lists every combination; the log shows only the top N.
 */
export const runSweepCommand = async (
	input: SweepCommandInput
): Promise<SweepCommandResult> => {
	const { config } = input;
	const configFingerprint = hashJson(config);
	const strategies = config.strategies.map((entry) => {
		const strategy = getStrategy(entry.id);
		return { strategy, grid: entry.grid ?? strategy.defaultGrid };
	});

	const candles = await loadCandles(input);
	const report = await runSweep({
		candles,
		strategies,
		settings: config.simulation,
		split: config.split,
		topN: config.topN,
		concurrency: config.concurrency,
		signal: input.signal,
	});

	for (const ranked of report.reports) {
		logger.info("ranked_report", {
			strategyId: ranked.strategyId,
			split: ranked.split,
			totalRuns: ranked.totalRuns,
			rows: rankedRows(ranked).slice(0, config.topN),
		});
	}
	logger.info("strategy_comparison", { rows: comparisonRows(report.comparison) });
	logger.info("overfitting_check", { rows: overfittingRows(report.overfitting) });

	fs.mkdirSync(input.outputDir, { recursive: true });
	const files: string[] = [];
	for (const ranked of report.reports) {
		files.push(
			writeFile(
				input.outputDir,
				`${ranked.strategyId}-${ranked.split}.csv`,
				formatResultsCsv(rankedRows(ranked))
			)
		);
		const best = ranked.entries[0];
		if (ranked.split === "test" && best) {
			files.push(
				writeFile(
					input.outputDir,
					`${ranked.strategyId}-best-trades.csv`,
					formatTradesCsv(best.result.trades)
				)
			);
		}
	}
	files.push(
		writeFile(input.outputDir, "comparison.csv", formatResultsCsv(comparisonRows(report.comparison))),
		writeFile(
			input.outputDir,
			"overfitting.csv",
			formatResultsCsv(overfittingRows(report.overfitting))
		),
		writeFile(
			input.outputDir,
			"summary.json",
			JSON.stringify(
				{
					configFingerprint,
					market: config.market,
					candles: summarizeCandles(candles),
					cutoff: formatTimestamp(report.cutoff),
					trainBars: report.trainBars,
					testBars: report.testBars,
					fullBars: report.fullBars,
					runs: report.runs,
					pruned: report.pruned.length,
					cache: report.cacheStats,
				},
				null,
				2
			)
		)
	);

	logger.info("sweep_outputs_written", {
		outputDir: input.outputDir,
		files: files.length,
		configFingerprint,
	});
	return { report, files, configFingerprint };
};
