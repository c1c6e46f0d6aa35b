export { BatchRunner } from "./runner.js";
export type {
  BatchResult,
  BatchRunnerConfig,
  ModelStore,
  RunnerState,
  SnapshotStore,
} from "./runner.js";
export { parseSnapshot, serializeSnapshot } from "./snapshot.js";
export type {
  BatchSnapshot,
  FailureRecord,
  SnapshotMetadata,
} from "./snapshot.js";
