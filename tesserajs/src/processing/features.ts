import { FeatureExtractionError } from "../errors.js";
import { RunningStats } from "./stats.js";
import type { FeatureVector, Tile } from "../types/index.js";

/**
 * Intensity statistics over every band of the tile
 *
 * Samples equal to the tile's nodata value, and NaN samples, are left out.
 * Throws when no sample remains.
 */
export function extractFeatures(
  tile: Pick<Tile, "id" | "bands" | "nodata">,
): FeatureVector {
  const stats = new RunningStats();

  for (const band of tile.bands)
    for (let i = 0; i < band.length; i++) {
      const value = band[i];
      if (Number.isNaN(value) || value === tile.nodata) continue;
      stats.push(value);
    }

  if (stats.count === 0)
    throw new FeatureExtractionError(`tile ${tile.id} has no valid pixel`);

  return {
    meanIntensity: stats.mean,
    stdIntensity: Math.sqrt(stats.variance),
  };
}
