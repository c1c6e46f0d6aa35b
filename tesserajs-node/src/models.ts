import fs from "node:fs/promises";
import path from "node:path";
import createDebug from "debug";
import { List } from "immutable";
import {
  ModelArtifactError,
  ModelNotFoundError,
  ThresholdClassifier,
} from "tesserajs";
import type { ModelStore } from "tesserajs";

import { isMissing, writeFileAtomic } from "./fs.js";

const debug = createDebug("tessera-node:models");

export const LATEST_MODEL_FILENAME = "latest_model.json";

/**
 * Persist a model as `model_<version>.json` in the directory
 *
 * Never replaces an existing artifact.
 *
 * @returns the artifact's path
 */
export async function saveModel(
  model: ThresholdClassifier,
  directory: string,
): Promise<string> {
  const file = path.join(directory, `model_${model.version}.json`);
  await writeFileAtomic(file, model.serialize(), { exclusive: true });
  debug("saved model %s to %s", model.version, file);

  return file;
}

/**
 * @throws ModelNotFoundError when there is no file at this path
 * @throws ModelArtifactError when the file is not a valid artifact
 */
export async function loadModel(file: string): Promise<ThresholdClassifier> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (e) {
    if (isMissing(e)) throw new ModelNotFoundError(file, { cause: e });
    throw e;
  }

  try {
    return ThresholdClassifier.deserialize(text);
  } catch (e) {
    if (e instanceof ModelArtifactError)
      throw new ModelArtifactError(`${file}: ${e.message}`, { cause: e });
    throw e;
  }
}

/**
 * Path of the most recently created model of the directory
 *
 * Files that are not model artifacts are skipped.
 *
 * @throws ModelNotFoundError when the directory holds no model
 */
export async function latestModel(directory: string): Promise<string> {
  let entries: string[];
  try {
    entries = await fs.readdir(directory);
  } catch (e) {
    if (isMissing(e)) throw new ModelNotFoundError(directory, { cause: e });
    throw e;
  }

  let candidates = List<{ file: string; createdAt: string }>();
  for (const name of entries.filter((name) => /^model_.+\.json$/.test(name))) {
    const file = path.join(directory, name);
    try {
      const { createdAt } = await loadModel(file);
      candidates = candidates.push({ file, createdAt });
    } catch (e) {
      if (!(e instanceof ModelArtifactError)) throw e;
      debug("skipping %s: %s", file, e.message);
    }
  }

  const newest = candidates.maxBy(
    ({ createdAt }) => Date.parse(createdAt),
  );
  if (newest === undefined) throw new ModelNotFoundError(directory);

  return newest.file;
}

/** Make an artifact the one scheduled runs pick up */
export async function promoteModel(
  file: string,
  latestPath: string,
): Promise<ThresholdClassifier> {
  const model = await loadModel(file);
  await writeFileAtomic(latestPath, model.serialize());
  debug("promoted model %s to %s", model.version, latestPath);

  return model;
}

/** References are artifact paths */
export const modelFiles: ModelStore = {
  load: loadModel,
};
