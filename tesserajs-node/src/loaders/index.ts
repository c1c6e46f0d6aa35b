export { GeoTiffRaster, loadTile, readCrs, readMetadata } from "./geotiff.js";
