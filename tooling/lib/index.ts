/**
 * Central export point for all library modules
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./utils";
export * from "./descriptors";
export * from "./signatures";
export * from "./value-synthesizer";
export * from "./structure-analyzer";
export * from "./oracle-runner";
export * from "./equivalence";
export * from "./cases";
export * from "./case-synthesizer";
export * from "./literals";
export * from "./manual-cases";
export * from "./module-loader";
export * from "./case-report";
export * from "./audit";
export * from "./logger";
