import {
	VOL_MEDIAN_WINDOW,
	closeToCloseReturns,
	createFeatureTable,
	maColumn,
	requiredMovingAverageWindows,
	requiredVolatilityWindows,
	rvColumn,
	rvMedianColumn,
	type FeatureTable,
	type PriceBar,
	type StrategySpecification,
} from "@ruleback/core";
import { rollingMean } from "./sma";
import { realizedVolatility, rollingMedian } from "./volatility";

/**
 * Builds the feature table a specification needs from raw daily bars:
 * close-to-close returns, one SMA column per referenced window, and a
 * realized-volatility column plus its trailing one-year median per
 * referenced volatility window.
 */
export const buildFeatureTable = (
	bars: readonly PriceBar[],
	spec: StrategySpecification
): FeatureTable => {
	const sorted = [...bars].sort((a, b) =>
		a.date < b.date ? -1 : a.date > b.date ? 1 : 0
	);
	const close = sorted.map((bar) => bar.close);
	const returns = closeToCloseReturns(close);
	const columns: Record<string, number[]> = {};

	for (const window of requiredMovingAverageWindows(spec)) {
		columns[maColumn(window)] = rollingMean(close, window);
	}

	for (const window of requiredVolatilityWindows(spec)) {
		const rv = realizedVolatility(returns, window);
		columns[rvColumn(window)] = rv;
		columns[rvMedianColumn(window)] = rollingMedian(rv, VOL_MEDIAN_WINDOW);
	}

	return createFeatureTable({
		dates: sorted.map((bar) => bar.date),
		close,
		returns,
		columns,
	});
};
