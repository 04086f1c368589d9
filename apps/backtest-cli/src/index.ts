#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import {
	createLogger,
	describeError,
	findWorkspaceRoot,
	isRulebackError,
	loadEnvFiles,
	resolveSpecPath,
	serializeStrategySpec,
} from "@ruleback/core";
import {
	CsvPriceHistorySource,
	MarketDataPriceHistorySource,
	createCcxtMarketDataClient,
	type PriceHistorySource,
} from "@ruleback/data";
import { formatFrameCsv, formatTradesCsv } from "@ruleback/metrics";
import {
	loadRuntimeConfig,
	runStrategyBacktest,
	type BacktestResult,
	type RuntimeConfig,
} from "@ruleback/runtime";
import { parseCliArgs, resolveCliOptions, type BacktestCliOptions } from "./cliArgs";

const logger = createLogger("backtest-cli");

const USAGE = `Usage:
  npm run backtest -- --spec <file.json> [options]

Options:
  --spec <file.json>       Strategy document (required; also accepted as first argument)
  --source <csv|ccxt>      Price history source (default RULEBACK_DATA_SOURCE or csv)
  --dataDir <dir>          Directory holding <TICKER>.csv files for the csv source
  --exchange <id>          Exchange id for the ccxt source (default binance)
  --envPath <path>         Extra .env file loaded after .env
  --json                   Print the full JSON result
  --csv                    Print the trade ledger as CSV
  --noSave                 Do not write the result under the output directory
  --help                   Show this message
`;

const buildSource = (
	options: BacktestCliOptions,
	config: RuntimeConfig
): PriceHistorySource => {
	const kind = options.source ?? config.dataSource;
	if (kind === "ccxt") {
		return new MarketDataPriceHistorySource(
			createCcxtMarketDataClient(options.exchange ?? config.exchange),
			{ logger }
		);
	}
	return new CsvPriceHistorySource(
		options.dataDir ? path.resolve(options.dataDir) : config.dataDir,
		{ logger }
	);
};

const formatValue = (value: number): string =>
	Number.isInteger(value) ? String(value) : value.toFixed(4);

const printSummary = (result: BacktestResult): void => {
	const { spec, trades, metrics, warnings } = result;
	console.log(`\n📈 ${spec.ticker} ${spec.startDate} → ${spec.endDate}`);
	if (warnings.length) {
		console.log("\n⚠️  Warnings");
		warnings.forEach((warning) => console.log(`  - ${warning}`));
	}
	console.log("\nMetrics");
	for (const [name, value] of Object.entries(metrics.values)) {
		if (typeof value === "number") {
			console.log(`  ${name.padEnd(14)} ${formatValue(value)}`);
		}
	}
	console.log(`\nTrades (${trades.length})`);
	trades.forEach((trade, idx) => {
		console.log(
			`  #${idx + 1} ${trade.entryDate} @ ${trade.entryPrice.toFixed(2)} → ${trade.exitDate} @ ${trade.exitPrice.toFixed(2)}  ${trade.pnlPct.toFixed(2)}%`
		);
		console.log(`     ${trade.entryReason}`);
		console.log(`     ${trade.exitReason}`);
	});
};

const toPayload = (result: BacktestResult) => ({
	spec: serializeStrategySpec(result.spec),
	metrics: result.metrics,
	warnings: result.warnings,
	trades: result.trades,
	frame: result.frame,
});

const persistResult = (result: BacktestResult, outputDir: string): string => {
	const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
	const safeTicker = result.spec.ticker.replace(/[\\/]/g, "");
	const baseName = `${safeTicker}-${result.spec.startDate}-${result.spec.endDate}-${timestamp}`;
	fs.mkdirSync(outputDir, { recursive: true });
	const outputPath = path.join(outputDir, `${baseName}.json`);
	fs.writeFileSync(outputPath, JSON.stringify(toPayload(result), null, 2));
	fs.writeFileSync(path.join(outputDir, `${baseName}-daily.csv`), formatFrameCsv(result.frame));
	const relative = path.relative(process.cwd(), outputPath) || outputPath;
	console.log(`\n📤 Backtest saved to ${relative}`);
	return outputPath;
};

const main = async (): Promise<void> => {
	const options = resolveCliOptions(parseCliArgs(process.argv.slice(2)));
	if (options.help || !options.specPath) {
		console.log(USAGE);
		return;
	}

	const workspaceRoot = findWorkspaceRoot();
	const envFiles = loadEnvFiles(workspaceRoot, options.envPath);
	const config = loadRuntimeConfig(process.env, { workspaceRoot });
	logger.debug("backtest_cli_config", { envFiles, config });

	const specFile = resolveSpecPath(
		options.specPath,
		path.join(workspaceRoot, "configs")
	);
	const document: unknown = JSON.parse(fs.readFileSync(specFile, "utf8"));

	const result = await runStrategyBacktest(
		{ spec: document },
		{
			source: buildSource(options, config),
			logger,
			retry: {
				maxAttempts: config.retry.maxAttempts,
				baseDelayMs: config.retry.baseDelayMs,
			},
		}
	);

	if (options.json) {
		console.log(JSON.stringify(toPayload(result), null, 2));
	} else {
		printSummary(result);
	}
	if (options.csv) {
		console.log(`\n${formatTradesCsv(result.trades)}`);
	}
	if (options.save) {
		persistResult(result, config.outputDir);
	}
};

main().catch((error: unknown) => {
	logger.error("backtest_cli_failed", {
		error: describeError(error),
		code: isRulebackError(error) ? error.code : undefined,
	});
	console.error(`❌ ${describeError(error)}`);
	process.exit(1);
});
