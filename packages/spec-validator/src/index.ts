export * from "./types";
export * from "./structural";
export * from "./dataChecks";
