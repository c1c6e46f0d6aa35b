export { ThresholdClassifier } from "./threshold.js";
export type {
  ModelArtifact,
  Provenance,
  TrainingOptions,
  TrainingStats,
} from "./threshold.js";
