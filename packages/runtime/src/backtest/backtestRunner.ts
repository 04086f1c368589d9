import { reconstructTrades, simulatePositions } from "@ruleback/backtest-core";
import {
	DataUnavailableError,
	DataValidationError,
	RuleConfigurationMismatch,
	RulebackError,
	StructuralValidationFailure,
	createLogger,
	describeError,
	parseStrategySpec,
	type PriceBar,
	type StrategySpecification,
} from "@ruleback/core";
import { buildFeatureTable } from "@ruleback/indicators";
import { computeMetrics } from "@ruleback/metrics";
import {
	findMissingColumns,
	validateSpec,
	validateWithData,
} from "@ruleback/spec-validator";
import { withRetry } from "../retry";
import type {
	BacktestDependencies,
	BacktestInput,
	BacktestResult,
} from "./backtestTypes";

export const runtimeLogger = createLogger("runtime");

export const unknownMetricWarning = (name: string): string =>
	`Metric "${name}" is not supported and was skipped.`;

const loadBars = async (
	spec: StrategySpecification,
	deps: BacktestDependencies
): Promise<PriceBar[]> => {
	const logger = deps.logger ?? runtimeLogger;
	const request = {
		ticker: spec.ticker,
		startDate: spec.startDate,
		endDate: spec.endDate,
	};
	const bars = await withRetry(() => deps.source.loadDailyBars(request), {
		...deps.retry,
		// Our own errors describe bad input, not a flaky source.
		shouldRetry: (error) => !(error instanceof RulebackError),
		onRetry: (attempt, error, delayMs) =>
			logger.warn("price_history_retry", {
				source: deps.source.name,
				ticker: spec.ticker,
				attempt,
				delayMs,
				error: describeError(error),
			}),
	});
	if (!bars.length) {
		throw new DataUnavailableError(
			`No price data for ${spec.ticker} between ${spec.startDate} and ${spec.endDate}.`,
			spec.ticker
		);
	}
	return bars;
};

/**
 * Parses, validates and backtests one strategy document. Blocking problems
 * throw from the taxonomy in @ruleback/core; everything advisory comes
 * back in `warnings`.
 */
export const runStrategyBacktest = async (
	input: BacktestInput,
	deps: BacktestDependencies
): Promise<BacktestResult> => {
	const logger = deps.logger ?? runtimeLogger;
	const spec = parseStrategySpec(input.spec);
	logger.info("backtest_started", {
		ticker: spec.ticker,
		startDate: spec.startDate,
		endDate: spec.endDate,
		entryRules: spec.entryRules.length,
		exitRules: spec.exitRules.length,
		entrySequential: spec.entrySequential,
	});

	const structural = validateSpec(spec);
	if (!structural.ok) {
		logger.error("structural_validation_failed", { errors: structural.errors });
		throw new StructuralValidationFailure(structural.errors, structural.warnings);
	}

	const bars = await loadBars(spec, deps);
	const table = buildFeatureTable(bars, spec);

	const dataChecks = validateWithData(spec, table);
	const warnings = [...structural.warnings, ...dataChecks.warnings];
	logger.info("validation_report", {
		ticker: spec.ticker,
		errors: dataChecks.errors,
		warnings: [...warnings],
	});
	if (!dataChecks.ok) {
		logger.error("data_validation_failed", { errors: dataChecks.errors });
		const missing = findMissingColumns(spec, table);
		throw missing.length
			? new RuleConfigurationMismatch(missing)
			: new DataValidationError(dataChecks.errors, warnings);
	}

	const frame = simulatePositions(spec, table);
	const trades = reconstructTrades(spec, table);
	const metrics = computeMetrics(frame, trades, spec.metrics);
	warnings.push(...metrics.unknownMetrics.map(unknownMetricWarning));
	logger.info("trade_ledger", { ticker: spec.ticker, trades });
	logger.info("backtest_metrics", { ticker: spec.ticker, metrics: metrics.values });

	logger.info("backtest_completed", {
		ticker: spec.ticker,
		bars: bars.length,
		trades: trades.length,
		warnings: warnings.length,
	});

	return { spec, frame, trades, metrics, warnings };
};
