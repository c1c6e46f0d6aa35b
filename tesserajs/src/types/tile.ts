import type { List } from "immutable";

import type { Affine, Crs, PixelBuffer, SampleFormat } from "./raster.js";

/** Index of a tile in the grid covering its parent raster */
export interface TilePosition {
  row: number;
  column: number;
}

/** Fixed-size window of a raster with its own georeferencing */
export interface Tile {
  id: string;
  position: TilePosition;
  width: number;
  height: number;
  sampleFormat: SampleFormat;
  /** one buffer per band, each `width * height` long */
  bands: readonly PixelBuffer[];
  transform: Affine;
  crs: Crs;
  nodata?: number;
}

/** Durable destination of freshly cut tiles */
export interface TileSink {
  /**
   * Persist the tile as an independent raster, completely or not at all
   *
   * @returns where the tile was written
   */
  write(tile: Tile): Promise<string>;
}

/** Read side of a tile collection */
export interface TileStore {
  /** human readable location, used in logs and errors */
  readonly location: string;
  list(): Promise<List<string>>;
  read(id: string): Promise<Tile>;
}

export function tileId(position: TilePosition): string {
  const pad = (n: number): string => n.toString().padStart(4, "0");
  return `tile_r${pad(position.row)}_c${pad(position.column)}`;
}

const TILE_ID = /^tile_r(\d+)_c(\d+)$/;

/** Inverse of `tileId`, undefined for names not produced by the tiler */
export function parseTileId(id: string): TilePosition | undefined {
  const match = TILE_ID.exec(id);
  if (match === null) return undefined;
  return { row: Number(match[1]), column: Number(match[2]) };
}
