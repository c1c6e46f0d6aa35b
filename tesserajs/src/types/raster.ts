/**
 * Affine geotransform [a, b, c, d, e, f] mapping pixel (column, row) to
 * coordinates (x, y):
 *   x = a * column + b * row + c
 *   y = d * column + e * row + f
 */
export type Affine = readonly [
  a: number,
  b: number,
  c: number,
  d: number,
  e: number,
  f: number,
];

/** Coordinate reference system, identified by its EPSG code */
export interface Crs {
  kind: "projected" | "geographic";
  epsg: number;
}

export type SampleFormat =
  | "uint8"
  | "uint16"
  | "int16"
  | "float32"
  | "float64";

/** Samples of a single band, row-major */
export type PixelBuffer = ArrayLike<number>;

/** Rectangle in pixel space, offset from the raster's top-left corner */
export interface PixelWindow {
  column: number;
  row: number;
  width: number;
  height: number;
}

export interface RasterMetadata {
  width: number;
  height: number;
  bands: number;
  sampleFormat: SampleFormat;
  // both absent when the file carries no georeferencing
  transform?: Affine;
  crs?: Crs;
  nodata?: number;
}

/** Raster that can be read one window at a time */
export interface RasterSource extends RasterMetadata {
  /** Read every band of the given window, one buffer per band */
  readWindow(window: PixelWindow): Promise<PixelBuffer[]>;
}
