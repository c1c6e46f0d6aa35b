import path from "node:path";
import createDebug from "debug";
import { List } from "immutable";
import {
  BatchRunner,
  DEFAULT_TILE_SIZE,
  healthConfig,
  RasterValidationError,
  ThresholdClassifier,
  tile,
} from "tesserajs";
import type { BatchResult, HealthConfig, Prediction } from "tesserajs";

import { GeoTiffRaster, loadTile } from "./loaders/index.js";
import {
  LATEST_MODEL_FILENAME,
  modelFiles,
  promoteModel,
  saveModel,
} from "./models.js";
import { SnapshotFile } from "./snapshots.js";
import { TileDirectory } from "./tiles.js";

const debug = createDebug("tessera-node:pipeline");

export interface TilingJob {
  rasterPath: string;
  tilesDirectory: string;
  tileSize?: number;
}

/**
 * Cut a GeoTIFF into tile files
 *
 * @returns ids of the written tiles, in row-major order
 * @throws RasterValidationError before writing anything if the raster is unusable
 */
export async function tileRaster({
  rasterPath,
  tilesDirectory,
  tileSize = DEFAULT_TILE_SIZE,
}: TilingJob): Promise<List<string>> {
  const raster = await GeoTiffRaster.open(rasterPath);
  try {
    if (raster.sampleFormat !== "uint8")
      throw new RasterValidationError(
        `tiles are written as 8-bit GeoTIFF, ${rasterPath} holds ${raster.sampleFormat} samples`,
      );

    let ids = List<string>();
    for await (const t of tile(raster, new TileDirectory(tilesDirectory), tileSize))
      ids = ids.push(t.id);
    debug("tiled %s into %o tiles", rasterPath, ids.size);

    return ids;
  } finally {
    await raster.close();
  }
}

export interface TrainingJob {
  tilesDirectory: string;
  modelsDirectory: string;
  /** also copy the new model to `latest_model.json` in the models directory */
  promote?: boolean;
}

export interface TrainingResult {
  model: ThresholdClassifier;
  modelPath: string;
  latestPath?: string;
}

/**
 * Train a model on every tile of a directory and save it
 *
 * @throws NoTilesError when the directory does not exist
 * @throws EmptyTrainingSetError when it holds no tile
 */
export async function trainFromTiles({
  tilesDirectory,
  modelsDirectory,
  promote = false,
}: TrainingJob): Promise<TrainingResult> {
  const model = await ThresholdClassifier.train(
    new TileDirectory(tilesDirectory).tiles(),
    { source: tilesDirectory },
  );
  const modelPath = await saveModel(model, modelsDirectory);
  if (!promote) return { model, modelPath };

  const latestPath = path.join(modelsDirectory, LATEST_MODEL_FILENAME);
  await promoteModel(modelPath, latestPath);

  return { model, modelPath, latestPath };
}

/** What a scheduler hands to a batch run */
export interface BatchInferenceConfig {
  tilesDirectory: string;
  modelPath: string;
  /** snapshot file, `{runId}` is replaced by the run identifier */
  outputPath: string;
  health?: Partial<HealthConfig>;
}

/**
 * Predict every tile of a directory and store one snapshot
 *
 * @throws ConfigurationError when the model, the tiles or the output path are unusable
 * @throws ModelArtifactError when the model artifact is malformed
 */
export async function runBatchInference(
  config: BatchInferenceConfig,
): Promise<BatchResult> {
  const health = healthConfig(config.health);
  const snapshots = new SnapshotFile(config.outputPath);
  await snapshots.ensureWritable();

  const runner = new BatchRunner(
    { modelReference: config.modelPath, health },
    {
      tiles: new TileDirectory(config.tilesDirectory),
      models: modelFiles,
      snapshots,
    },
  );

  return await runner.run();
}

/** Single tile, same decision as a batch run */
export async function predictTile(
  tilePath: string,
  model: ThresholdClassifier,
): Promise<Prediction> {
  return model.predict(await loadTile(tilePath));
}
