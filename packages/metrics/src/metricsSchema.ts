/** Always reported, whatever the specification asks for. */
export const CORE_METRICS = ["cagr", "max_drawdown", "sharpe", "num_trades"] as const;

/** Reported only when named in the specification's metrics list. */
export const OPTIONAL_METRICS = [
	"total_return",
	"volatility",
	"sortino",
	"calmar",
	"win_rate",
	"avg_trade_pct",
	"exposure",
] as const;

export type CoreMetricName = (typeof CORE_METRICS)[number];
export type OptionalMetricName = (typeof OPTIONAL_METRICS)[number];

export type MetricValues = Record<CoreMetricName, number> &
	Partial<Record<OptionalMetricName, number>>;

export interface MetricsReport {
	values: MetricValues;
	/** Requested names this package does not compute, in request order. */
	unknownMetrics: string[];
}

export const isOptionalMetric = (name: string): name is OptionalMetricName =>
	OPTIONAL_METRICS.some((metric) => metric === name);

export const isCoreMetric = (name: string): name is CoreMetricName =>
	CORE_METRICS.some((metric) => metric === name);
