export { rollingMean } from "./sma";
export {
	median,
	rollingMedian,
	rollingStdDev,
	realizedVolatility,
	sampleStdDev,
} from "./volatility";
export { buildFeatureTable } from "./featureTable";
