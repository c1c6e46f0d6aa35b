export * from "./loaders/index.js";
export { encodeGeoTiff, TileDirectory } from "./tiles.js";
export type { GeoTiffImage } from "./tiles.js";
export {
  LATEST_MODEL_FILENAME,
  latestModel,
  loadModel,
  modelFiles,
  promoteModel,
  saveModel,
} from "./models.js";
export { loadSnapshot, SnapshotFile } from "./snapshots.js";
export { defaultPipelineConfig, loadPipelineConfig } from "./config.js";
export type { PipelineConfig } from "./config.js";
export {
  predictTile,
  runBatchInference,
  tileRaster,
  trainFromTiles,
} from "./pipeline.js";
export type {
  BatchInferenceConfig,
  TilingJob,
  TrainingJob,
  TrainingResult,
} from "./pipeline.js";
