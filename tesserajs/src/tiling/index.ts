export { grid, tile, validateRaster } from "./tiler.js";
export type { GridCell } from "./tiler.js";
