import path from "node:path";
import { parse } from "ts-command-line-args";
import { tileRaster } from "tesserajs-node";

import { commonArgs, pipelineConfig, reportFailure, usage } from "./args.js";
import type { CommonArgs } from "./args.js";

interface TileArgs extends CommonArgs {
  raster: string;
  output?: string;
  tileSize?: number;
}

const args = parse<TileArgs>(
  {
    ...commonArgs,
    raster: {
      type: String,
      alias: "r",
      description: "GeoTIFF to cut, relative to the raw data directory",
    },
    output: {
      type: String,
      alias: "o",
      optional: true,
      description: "Directory receiving the tile files",
    },
    tileSize: {
      type: Number,
      alias: "s",
      optional: true,
      description: "Side of the square tiles, in pixels",
    },
  },
  usage<TileArgs>(
    "Tessera tiling",
    "Cut a georeferenced raster into fixed-size GeoTIFF tiles. Edge remainders are dropped.",
  ),
);

async function main(): Promise<void> {
  const config = await pipelineConfig(args.config);
  const rasterPath = path.resolve(config.paths.raw, args.raster);
  const tilesDirectory = args.output ?? config.paths.tiles;

  const ids = await tileRaster({
    rasterPath,
    tilesDirectory,
    tileSize: args.tileSize ?? config.tileSize,
  });

  console.log(`Wrote ${ids.size} tiles from ${rasterPath} to ${tilesDirectory}`);
}

main().catch(reportFailure);
