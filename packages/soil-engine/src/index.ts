export * from "./schema.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./validation/ranges.js";
export * from "./validation/range-validator.js";
export * from "./validation/coordinate.js";
export * from "./http/resilient-fetcher.js";
export * from "./adapters/index.js";
export * from "./engine/soil-classifier.js";
export * from "./engine/quality.js";
export * from "./engine/profile-builder.js";
export * from "./engine/analyzer.js";
export * from "./narrative.js";
export * from "./storage/index.js";
export * from "./batch/index.js";
export { runSoilAnalysis } from "./cli/runner.js";
export type { BatchSummary, RunnerDependencies, RunnerInput, RunnerOutcome, RunnerOutput } from "./cli/runner.js";
