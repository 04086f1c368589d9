export * from "./metricsSchema";
export * from "./calcPerformance";
export * from "./formatCSV";
