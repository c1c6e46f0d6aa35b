import path from "node:path";
import { parse } from "ts-command-line-args";
import {
  LATEST_MODEL_FILENAME,
  latestModel,
  runBatchInference,
} from "tesserajs-node";

import { commonArgs, pipelineConfig, reportFailure, usage } from "./args.js";
import type { CommonArgs } from "./args.js";

interface InferArgs extends CommonArgs {
  tiles?: string;
  model?: string;
  newest?: boolean;
  output?: string;
}

const args = parse<InferArgs>(
  {
    ...commonArgs,
    tiles: {
      type: String,
      alias: "t",
      optional: true,
      description: "Directory of tiles to predict",
    },
    model: {
      type: String,
      alias: "m",
      optional: true,
      description: `Model artifact, defaults to ${LATEST_MODEL_FILENAME} in the models directory`,
    },
    newest: {
      type: Boolean,
      optional: true,
      description: "Use the most recently created model of the models directory",
    },
    output: {
      type: String,
      alias: "o",
      optional: true,
      description: "Snapshot file, {runId} is replaced by the run identifier",
    },
  },
  usage<InferArgs>(
    "Tessera batch inference",
    "Predict every tile of a directory with one model and store a snapshot with monitoring metrics and a health report.",
  ),
);

async function main(): Promise<void> {
  const config = await pipelineConfig(args.config);

  let modelPath: string;
  if (args.model !== undefined) modelPath = args.model;
  else if (args.newest === true) modelPath = await latestModel(config.paths.models);
  else modelPath = path.join(config.paths.models, LATEST_MODEL_FILENAME);

  const { snapshot, location } = await runBatchInference({
    tilesDirectory: args.tiles ?? config.paths.tiles,
    modelPath,
    outputPath:
      args.output ?? path.join(config.paths.outputs, "batch_predictions_{runId}.json"),
    health: config.health,
  });

  const { metadata } = snapshot;
  console.log(
    `Run ${metadata.runId}: ${metadata.tilesInferred} tiles inferred, ${metadata.tilesFailed} failed`,
  );
  console.log(`Health: ${metadata.healthReport.status}`);
  for (const recommendation of metadata.healthReport.recommendations)
    console.log(`  - ${recommendation}`);
  console.log(`Snapshot written to ${location}`);
}

main().catch(reportFailure);
