import createDebug from "debug";
import { List, Range } from "immutable";

import { validateTileSize } from "../config.js";
import { Dataset } from "../dataset/index.js";
import { RasterValidationError } from "../errors.js";
import { isRectilinear, windowTransform } from "../processing/affine.js";
import type {
  Affine,
  Crs,
  PixelWindow,
  RasterMetadata,
  RasterSource,
  Tile,
  TilePosition,
  TileSink,
} from "../types/index.js";
import { tileId } from "../types/index.js";

const debug = createDebug("tessera:tiler");

/** Candidate window of the grid, whole or cut by the raster's edge */
export interface GridCell extends PixelWindow {
  position: TilePosition;
  /** false for the remainder cells along the right and bottom edges */
  complete: boolean;
}

/** Row-major grid of `size` x `size` cells anchored at the top-left corner */
export function grid(width: number, height: number, size: number): List<GridCell> {
  validateTileSize(size);

  return Range(0, height, size)
    .flatMap((row) =>
      Range(0, width, size).map((column) => ({
        column,
        row,
        width: Math.min(size, width - column),
        height: Math.min(size, height - row),
        position: { row: row / size, column: column / size },
        complete: column + size <= width && row + size <= height,
      })),
    )
    .toList();
}

/** Georeferencing that tiles inherit, checked before anything is written */
export function validateRaster(
  raster: RasterMetadata,
): { transform: Affine; crs: Crs } {
  const { transform, crs } = raster;

  const positive = (n: number): boolean => Number.isInteger(n) && n > 0;

  if (!positive(raster.width) || !positive(raster.height))
    throw new RasterValidationError(
      `invalid raster dimensions: width=${raster.width}, height=${raster.height}`,
    );
  if (crs === undefined)
    throw new RasterValidationError("raster has no CRS defined");
  if (transform === undefined)
    throw new RasterValidationError("raster has no affine transform");
  if (!isRectilinear(transform))
    throw new RasterValidationError(
      `rotated or degenerate transform is not supported: [${transform.join(", ")}]`,
    );

  return { transform, crs };
}

/**
 * Cut a raster into square tiles and persist each of them
 *
 * Validation happens on call, so an invalid raster fails before the first
 * tile is written. The returned Dataset is lazy: a window is read, written to
 * the sink, and only then yielded. Remainder windows along the edges are
 * dropped, every yielded tile is exactly `tileSize` x `tileSize`.
 * Iterating again re-reads and rewrites the same tiles.
 */
export function tile(
  raster: RasterSource,
  sink: TileSink,
  tileSize: number,
): Dataset<Tile> {
  const size = validateTileSize(tileSize);
  const { transform, crs } = validateRaster(raster);

  const cells = grid(raster.width, raster.height, size);
  const dropped = cells.count((cell) => !cell.complete);
  debug(
    "%o full tiles of %opx, %o edge windows dropped",
    cells.size - dropped,
    size,
    dropped,
  );

  return new Dataset(cells)
    .filter((cell) => cell.complete)
    .map(async (cell) => {
      const bands = await raster.readWindow(cell);
      const expected = cell.width * cell.height;
      bands.forEach((band, index) => {
        if (band.length !== expected)
          throw new RasterValidationError(
            `window ${tileId(cell.position)} band ${index} holds ${band.length} samples, expected ${expected}`,
          );
      });

      const ret: Tile = {
        id: tileId(cell.position),
        position: cell.position,
        width: size,
        height: size,
        sampleFormat: raster.sampleFormat,
        bands,
        transform: windowTransform(transform, cell),
        crs,
        nodata: raster.nodata,
      };

      const location = await sink.write(ret);
      debug("wrote %s to %s", ret.id, location);

      return ret;
    });
}
