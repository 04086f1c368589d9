export * from "./simulator";
export * from "./tradeReconstructor";
