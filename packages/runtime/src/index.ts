export * from "./retry";
export * from "./loadRuntimeConfig";
export * from "./backtest/backtestTypes";
export {
	runStrategyBacktest,
	runtimeLogger,
	unknownMetricWarning,
} from "./backtest/backtestRunner";
