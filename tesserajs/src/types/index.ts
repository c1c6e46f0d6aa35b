export * from "./raster.js";
export * from "./tile.js";
export * from "./prediction.js";
