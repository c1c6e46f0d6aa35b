import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  ConfigurationError,
  DEFAULT_TILE_SIZE,
  healthConfig,
} from "tesserajs";
import type { HealthConfig } from "tesserajs";

import { isMissing } from "./fs.js";

/** Locations and limits of a deployment, all paths absolute */
export interface PipelineConfig {
  tileSize: number;
  paths: {
    /** rasters to tile */
    raw: string;
    tiles: string;
    models: string;
    /** batch snapshots */
    outputs: string;
  };
  health: HealthConfig;
}

const fileSchema = z
  .object({
    tileSize: z.number().int().positive(),
    paths: z
      .object({
        raw: z.string().min(1),
        tiles: z.string().min(1),
        models: z.string().min(1),
        outputs: z.string().min(1),
      })
      .strict()
      .partial(),
    health: z
      .object({
        maxFailureRatio: z.number(),
        maxClassProportion: z.number(),
        maxBaselineDrift: z.number(),
      })
      .strict()
      .partial(),
  })
  .strict()
  .partial();

/** Layout under a project directory when nothing is configured */
export function defaultPipelineConfig(root: string = process.cwd()): PipelineConfig {
  return {
    tileSize: DEFAULT_TILE_SIZE,
    paths: {
      raw: path.resolve(root, "data", "raw"),
      tiles: path.resolve(root, "data", "tiles"),
      models: path.resolve(root, "models"),
      outputs: path.resolve(root, "outputs"),
    },
    health: healthConfig(),
  };
}

/**
 * Read a JSON configuration file
 *
 * Missing entries take their default; relative paths are resolved against
 * the directory of the file.
 *
 * @throws ConfigurationError when the file is absent or invalid
 */
export async function loadPipelineConfig(file: string): Promise<PipelineConfig> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (e) {
    if (isMissing(e))
      throw new ConfigurationError(`configuration file not found: ${file}`, {
        cause: e,
      });
    throw e;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigurationError(`${file} is not valid JSON`, { cause: e });
  }

  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success)
    throw new ConfigurationError(
      `invalid configuration in ${file}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ")}`,
    );

  const root = path.dirname(path.resolve(file));
  const defaults = defaultPipelineConfig(root);
  const paths = parsed.data.paths ?? {};
  const resolve = (entry: string | undefined, fallback: string): string =>
    entry === undefined ? fallback : path.resolve(root, entry);

  return {
    tileSize: parsed.data.tileSize ?? defaults.tileSize,
    paths: {
      raw: resolve(paths.raw, defaults.paths.raw),
      tiles: resolve(paths.tiles, defaults.paths.tiles),
      models: resolve(paths.models, defaults.paths.models),
      outputs: resolve(paths.outputs, defaults.paths.outputs),
    },
    health: healthConfig(parsed.data.health),
  };
}
