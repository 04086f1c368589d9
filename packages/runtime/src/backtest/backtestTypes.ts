import type { SimulationFrame, Trade } from "@ruleback/backtest-core";
import type { ModuleLogger, StrategySpecification } from "@ruleback/core";
import type { PriceHistorySource } from "@ruleback/data";
import type { MetricsReport } from "@ruleback/metrics";
import type { RetryOptions } from "../retry";

export interface BacktestInput {
	/** Interchange document, as read from JSON. */
	spec: unknown;
}

export interface BacktestDependencies {
	source: PriceHistorySource;
	retry?: Omit<RetryOptions, "onRetry" | "shouldRetry">;
	logger?: ModuleLogger;
}

export interface BacktestResult {
	spec: StrategySpecification;
	frame: SimulationFrame;
	trades: Trade[];
	metrics: MetricsReport;
	/** Structural, data and metrics warnings, in that order. */
	warnings: string[];
}
