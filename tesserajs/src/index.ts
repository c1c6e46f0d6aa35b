export * from "./errors.js";
export * from "./config.js";
export * from "./types/index.js";

export { Dataset } from "./dataset/index.js";
export * as processing from "./processing/index.js";
export { RunningStats } from "./processing/stats.js";
export type { StatsSummary } from "./processing/stats.js";
export * from "./tiling/index.js";
export * from "./models/index.js";
export * from "./observability/index.js";
export * from "./batch/index.js";
