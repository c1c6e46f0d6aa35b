export * as affine from "./affine.js";
export { extractFeatures } from "./features.js";
export { RunningStats } from "./stats.js";
export type { StatsSummary } from "./stats.js";
