import { parse } from "ts-command-line-args";
import { trainFromTiles } from "tesserajs-node";

import { commonArgs, pipelineConfig, reportFailure, usage } from "./args.js";
import type { CommonArgs } from "./args.js";

interface TrainArgs extends CommonArgs {
  tiles?: string;
  models?: string;
  keepLatest?: boolean;
}

const args = parse<TrainArgs>(
  {
    ...commonArgs,
    tiles: {
      type: String,
      alias: "t",
      optional: true,
      description: "Directory of training tiles",
    },
    models: {
      type: String,
      alias: "m",
      optional: true,
      description: "Directory receiving the model artifact",
    },
    keepLatest: {
      type: Boolean,
      optional: true,
      description: "Do not make the new model the one batch runs pick up",
    },
  },
  usage<TrainArgs>(
    "Tessera training",
    "Learn a mean intensity threshold from tiles and save it as a new model version.",
  ),
);

async function main(): Promise<void> {
  const config = await pipelineConfig(args.config);

  const { model, modelPath, latestPath } = await trainFromTiles({
    tilesDirectory: args.tiles ?? config.paths.tiles,
    modelsDirectory: args.models ?? config.paths.models,
    promote: args.keepLatest !== true,
  });

  console.log(
    `Model ${model.version} trained on ${model.trainingStats?.tileCount ?? 0} tiles, threshold ${model.threshold}`,
  );
  console.log(`Saved at ${modelPath}`);
  if (latestPath !== undefined) console.log(`Latest model updated at ${latestPath}`);
}

main().catch(reportFailure);
