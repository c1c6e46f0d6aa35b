import fs from "node:fs/promises";
import path from "node:path";
import createDebug from "debug";
import { writeArrayBuffer } from "geotiff";
import { List } from "immutable";
import { Dataset, NoTilesError, RasterValidationError } from "tesserajs";
import type { Tile, TileSink, TileStore } from "tesserajs";

import { isMissing, writeFileAtomic } from "./fs.js";
import { loadTile } from "./loaders/index.js";

const debug = createDebug("tessera-node:tiles");

const PREFIX = "tile_";
const EXTENSION = ".tif";

/** Georeferenced pixels as they are written to disk */
export type GeoTiffImage = Pick<
  Tile,
  "width" | "height" | "sampleFormat" | "bands" | "transform" | "crs" | "nodata"
>;

/**
 * Encode an image as a standalone GeoTIFF
 *
 * Pixels are interleaved band by band; the geokeys carry the image's own
 * origin and CRS. Only 8-bit unsigned samples can be written.
 */
export function encodeGeoTiff(image: GeoTiffImage): Uint8Array {
  if (image.sampleFormat !== "uint8")
    throw new RasterValidationError(
      `only 8-bit GeoTIFF can be written, got ${image.sampleFormat} samples`,
    );

  const pixels = image.width * image.height;
  const bands = image.bands.length;
  const values = new Uint8Array(pixels * bands);
  image.bands.forEach((band, b) => {
    for (let i = 0; i < pixels; i++) values[i * bands + b] = band[i];
  });

  const [a, , c, , e, f] = image.transform;
  const projected = image.crs.kind === "projected";
  const metadata = {
    width: image.width,
    height: image.height,
    ModelPixelScale: [a, -e, 0],
    ModelTiepoint: [0, 0, 0, c, f, 0],
    GTModelTypeGeoKey: projected ? 1 : 2,
    ...(projected
      ? { ProjectedCSTypeGeoKey: image.crs.epsg }
      : { GeographicTypeGeoKey: image.crs.epsg }),
    ...(image.nodata !== undefined ? { GDAL_NODATA: `${image.nodata}` } : {}),
  };

  const encoded: ArrayBuffer = writeArrayBuffer(values, metadata);
  return new Uint8Array(encoded);
}

/** Folder of one GeoTIFF per tile, named after the tile id */
export class TileDirectory implements TileSink, TileStore {
  constructor(readonly location: string) {}

  pathOf(id: string): string {
    return path.join(this.location, `${id}${EXTENSION}`);
  }

  async write(tile: Tile): Promise<string> {
    const file = this.pathOf(tile.id);
    await writeFileAtomic(file, encodeGeoTiff(tile));
    return file;
  }

  /**
   * Ids of the `tile_*.tif` files, sorted
   *
   * @throws NoTilesError when the directory does not exist
   */
  async list(): Promise<List<string>> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.location);
    } catch (e) {
      if (isMissing(e)) throw new NoTilesError(this.location);
      throw e;
    }

    // misnamed tiles are listed too, reading them fails
    const ids = List(entries)
      .filter(
        (name) => name.startsWith(PREFIX) && path.extname(name) === EXTENSION,
      )
      .map((name) => path.basename(name, EXTENSION))
      .sort();
    debug("found %o tiles in %s", ids.size, this.location);

    return ids;
  }

  read(id: string): Promise<Tile> {
    return loadTile(this.pathOf(id));
  }

  /** Every tile of the directory, read lazily one at a time */
  tiles(): Dataset<Tile> {
    return new Dataset(
      async function* (this: TileDirectory) {
        for (const id of await this.list()) yield await this.read(id);
      }.bind(this),
    );
  }
}
