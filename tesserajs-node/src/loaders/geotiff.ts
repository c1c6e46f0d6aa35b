import path from "node:path";
import createDebug from "debug";
import { fromFile } from "geotiff";
import type { GeoTIFF, GeoTIFFImage } from "geotiff";
import {
  parseTileId,
  RasterValidationError,
  TileReadError,
  validateRaster,
} from "tesserajs";
import type {
  Affine,
  Crs,
  PixelBuffer,
  PixelWindow,
  RasterMetadata,
  RasterSource,
  SampleFormat,
  Tile,
} from "tesserajs";

const debug = createDebug("tessera-node:loaders:geotiff");

// GeoTIFF geokey values
const MODEL_TYPE_PROJECTED = 1;
const MODEL_TYPE_GEOGRAPHIC = 2;
const USER_DEFINED = 32767;

function numericKey(keys: unknown, name: string): number | undefined {
  if (typeof keys !== "object" || keys === null) return undefined;
  const value: unknown = Reflect.get(keys, name);
  return typeof value === "number" ? value : undefined;
}

/** EPSG-coded CRS from the geokey directory, undefined if absent */
export function readCrs(geoKeys: unknown): Crs | undefined {
  const usable = (code: number | undefined): code is number =>
    code !== undefined && Number.isInteger(code) && code > 0 && code !== USER_DEFINED;

  const modelType = numericKey(geoKeys, "GTModelTypeGeoKey");
  const projected = numericKey(geoKeys, "ProjectedCSTypeGeoKey");
  const geographic = numericKey(geoKeys, "GeographicTypeGeoKey");

  if (modelType !== MODEL_TYPE_GEOGRAPHIC && usable(projected))
    return { kind: "projected", epsg: projected };
  if (modelType !== MODEL_TYPE_PROJECTED && usable(geographic))
    return { kind: "geographic", epsg: geographic };
  return undefined;
}

function readTransform(image: GeoTIFFImage): Affine | undefined {
  let origin: number[];
  let resolution: number[];
  try {
    origin = image.getOrigin();
    resolution = image.getResolution();
  } catch (e) {
    debug("no usable transform: %o", e);
    return undefined;
  }

  const [x, y] = origin;
  const [width, height] = resolution;
  return [width, 0, x, 0, height, y];
}

function readSampleFormat(image: GeoTIFFImage): SampleFormat {
  const format = image.getSampleFormat(0);
  const bits = image.getBitsPerSample(0);

  // TIFF SampleFormat: 1 unsigned, 2 signed, 3 floating point
  if (format === 1 && bits === 8) return "uint8";
  if (format === 1 && bits === 16) return "uint16";
  if (format === 2 && bits === 16) return "int16";
  if (format === 3 && bits === 32) return "float32";
  if (format === 3 && bits === 64) return "float64";
  throw new RasterValidationError(
    `unsupported sample format ${format} with ${bits} bits per sample`,
  );
}

export function readMetadata(image: GeoTIFFImage): RasterMetadata {
  const nodata = image.getGDALNoData();

  return {
    width: image.getWidth(),
    height: image.getHeight(),
    bands: image.getSamplesPerPixel(),
    sampleFormat: readSampleFormat(image),
    transform: readTransform(image),
    crs: readCrs(image.getGeoKeys()),
    nodata: nodata ?? undefined,
  };
}

async function readBands(
  image: GeoTIFFImage,
  window: PixelWindow,
): Promise<PixelBuffer[]> {
  const rasters = await image.readRasters({
    window: [
      window.column,
      window.row,
      window.column + window.width,
      window.row + window.height,
    ],
    interleave: false,
  });
  if (!Array.isArray(rasters))
    throw new Error("expected one array per band from the GeoTIFF reader");

  return [...rasters];
}

/** GeoTIFF on disk, read window by window */
export class GeoTiffRaster implements RasterSource {
  readonly width: number;
  readonly height: number;
  readonly bands: number;
  readonly sampleFormat: SampleFormat;
  readonly transform?: Affine;
  readonly crs?: Crs;
  readonly nodata?: number;

  private constructor(
    readonly file: string,
    private readonly tiff: GeoTIFF,
    private readonly image: GeoTIFFImage,
  ) {
    const metadata = readMetadata(image);
    this.width = metadata.width;
    this.height = metadata.height;
    this.bands = metadata.bands;
    this.sampleFormat = metadata.sampleFormat;
    this.transform = metadata.transform;
    this.crs = metadata.crs;
    this.nodata = metadata.nodata;
  }

  /** Read the header of the first image, pixels stay on disk */
  static async open(file: string): Promise<GeoTiffRaster> {
    let tiff: GeoTIFF;
    try {
      tiff = await fromFile(file);
    } catch (e) {
      throw new RasterValidationError(`cannot open raster ${file}`, {
        cause: e,
      });
    }

    try {
      return new GeoTiffRaster(file, tiff, await tiff.getImage());
    } catch (e) {
      await tiff.close();
      throw e;
    }
  }

  readWindow(window: PixelWindow): Promise<PixelBuffer[]> {
    return readBands(this.image, window);
  }

  async close(): Promise<void> {
    await this.tiff.close();
  }
}

/**
 * Read a tile file written by the tiler
 *
 * The tile id is the file name without extension.
 *
 * @throws TileReadError when the file cannot be decoded or lacks metadata
 */
export async function loadTile(file: string): Promise<Tile> {
  const id = path.basename(file, path.extname(file));
  const position = parseTileId(id);
  if (position === undefined)
    throw new TileReadError(`${file} is not named like a tile`);

  let tiff: GeoTIFF;
  try {
    tiff = await fromFile(file);
  } catch (e) {
    throw new TileReadError(`cannot open tile ${file}`, { cause: e });
  }

  try {
    const image = await tiff.getImage();
    const metadata = readMetadata(image);
    const { transform, crs } = validateRaster(metadata);

    return {
      id,
      position,
      width: metadata.width,
      height: metadata.height,
      sampleFormat: metadata.sampleFormat,
      bands: await readBands(image, {
        column: 0,
        row: 0,
        width: metadata.width,
        height: metadata.height,
      }),
      transform,
      crs,
      nodata: metadata.nodata,
    };
  } catch (e) {
    throw new TileReadError(`cannot read tile ${file}`, { cause: e });
  } finally {
    await tiff.close();
  }
}
