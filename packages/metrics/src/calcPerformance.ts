import type { SimulationFrame, Trade } from "@ruleback/backtest-core";
import { TRADING_DAYS_PER_YEAR } from "@ruleback/core";
import { sampleStdDev } from "@ruleback/indicators";
import {
	isCoreMetric,
	isOptionalMetric,
	type MetricValues,
	type MetricsReport,
	type OptionalMetricName,
} from "./metricsSchema";

const ANNUALIZATION = Math.sqrt(TRADING_DAYS_PER_YEAR);

const mean = (values: readonly number[]): number =>
	values.length
		? values.reduce((sum, value) => sum + value, 0) / values.length
		: 0;

/** Compound annual growth with years = rows / 252. */
export const computeCagr = (equityCurve: readonly number[]): number => {
	if (!equityCurve.length) {
		return 0;
	}
	const start = equityCurve[0];
	const end = equityCurve[equityCurve.length - 1];
	if (start <= 0 || end <= 0) {
		return 0;
	}
	const years = equityCurve.length / TRADING_DAYS_PER_YEAR;
	return Math.pow(end / start, 1 / years) - 1;
};

/** Worst fall from a running peak, as a fraction (zero or negative). */
export const computeMaxDrawdown = (equityCurve: readonly number[]): number => {
	let peak = Number.NEGATIVE_INFINITY;
	let worst = 0;
	for (const equity of equityCurve) {
		peak = Math.max(peak, equity);
		worst = Math.min(worst, equity / peak - 1);
	}
	return worst;
};

/** Annualized mean over sample standard deviation; 0 when undefined. */
export const computeSharpe = (returns: readonly number[]): number => {
	const std = sampleStdDev(returns);
	if (!Number.isFinite(std) || std === 0) {
		return 0;
	}
	return (mean(returns) / std) * ANNUALIZATION;
};

// Downside deviation counts every sample, with gains as zero.
export const computeSortino = (returns: readonly number[]): number => {
	if (returns.length < 2) {
		return 0;
	}
	const downside = Math.sqrt(mean(returns.map((value) => Math.min(value, 0) ** 2)));
	return downside === 0 ? 0 : (mean(returns) / downside) * ANNUALIZATION;
};

/** Flat-to-long transitions, counting a long first day as one. */
export const countEntries = (position: readonly number[]): number =>
	position.filter(
		(value, day) => value === 1 && (day === 0 || position[day - 1] === 0)
	).length;

const optionalMetric = (
	name: OptionalMetricName,
	frame: SimulationFrame,
	trades: readonly Trade[],
	core: MetricValues
): number => {
	switch (name) {
		case "total_return": {
			const { equityCurve } = frame;
			return equityCurve.length
				? equityCurve[equityCurve.length - 1] / equityCurve[0] - 1
				: 0;
		}
		case "volatility": {
			const std = sampleStdDev(frame.strategyReturn);
			return Number.isFinite(std) ? std * ANNUALIZATION : 0;
		}
		case "sortino":
			return computeSortino(frame.strategyReturn);
		case "calmar":
			return core.max_drawdown < 0 ? core.cagr / Math.abs(core.max_drawdown) : 0;
		case "win_rate":
			return trades.length
				? trades.filter((trade) => trade.pnlPct > 0).length / trades.length
				: 0;
		case "avg_trade_pct":
			return mean(trades.map((trade) => trade.pnlPct));
		case "exposure":
			return mean(frame.position);
	}
};

/**
 * Performance of a simulated run. The core metrics are always present;
 * optional ones are added when `requested` names them, and names nobody
 * computes are handed back in `unknownMetrics`.
 */
export const computeMetrics = (
	frame: SimulationFrame,
	trades: readonly Trade[],
	requested: readonly string[] = []
): MetricsReport => {
	const values: MetricValues = {
		cagr: computeCagr(frame.equityCurve),
		max_drawdown: computeMaxDrawdown(frame.equityCurve),
		sharpe: computeSharpe(frame.strategyReturn),
		num_trades: countEntries(frame.position),
	};
	const unknownMetrics: string[] = [];
	for (const name of requested) {
		if (isOptionalMetric(name)) {
			values[name] = optionalMetric(name, frame, trades, values);
		} else if (!isCoreMetric(name) && !unknownMetrics.includes(name)) {
			unknownMetrics.push(name);
		}
	}
	return { values, unknownMetrics };
};
