/**
 * Shared contracts for the backtester: the strategy specification model,
 * the feature-table shape, the error taxonomy and the logging/env helpers
 * every other package depends on.
 */
export * from "./types";
export * from "./errors";
export * from "./featureTable";
export * from "./spec";
export * from "./env";
export * from "./config";
export * from "./utils/logger";
