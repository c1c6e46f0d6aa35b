import { randomUUID } from "node:crypto";
import createDebug from "debug";
import { List } from "immutable";
import { z } from "zod";

import { EmptyTrainingSetError, ModelArtifactError } from "../errors.js";
import { RunningStats } from "../processing/stats.js";
import { extractFeatures } from "../processing/features.js";
import type { PredictedClass, Prediction, Tile } from "../types/index.js";

const debug = createDebug("tessera:models:threshold");

const trainingStatsSchema = z.object({
  tileCount: z.number().int().positive(),
  mean: z.number().finite(),
  std: z.number().finite().nonnegative(),
});

const artifactSchema = z.object({
  version: z.string().min(1),
  threshold: z.number().finite(),
  createdAt: z.string().datetime(),
  provenance: z
    .object({
      tileIds: z.array(z.string()),
      source: z.string().optional(),
    })
    .optional(),
  trainingStats: trainingStatsSchema.optional(),
});

/** Persisted form of a model */
export type ModelArtifact = z.infer<typeof artifactSchema>;
/** Distribution of tile mean intensities seen at training */
export type TrainingStats = z.infer<typeof trainingStatsSchema>;

export interface Provenance {
  readonly tileIds: readonly string[];
  readonly source?: string;
}

export interface TrainingOptions {
  /** where the training tiles came from, kept as provenance */
  source?: string;
}

/**
 * Binary classifier over the mean intensity of a tile
 *
 * Immutable: retraining yields another instance with a fresh version.
 */
export class ThresholdClassifier {
  readonly version: string;
  readonly threshold: number;
  readonly createdAt: string;
  readonly provenance?: Provenance;
  readonly trainingStats?: TrainingStats;

  private constructor(artifact: ModelArtifact) {
    this.version = artifact.version;
    this.threshold = artifact.threshold;
    this.createdAt = artifact.createdAt;
    if (artifact.provenance !== undefined)
      this.provenance = Object.freeze({
        ...artifact.provenance,
        tileIds: Object.freeze([...artifact.provenance.tileIds]),
      });
    if (artifact.trainingStats !== undefined)
      this.trainingStats = Object.freeze({ ...artifact.trainingStats });
    Object.freeze(this);
  }

  /**
   * Use the average tile mean intensity as decision threshold
   *
   * @throws EmptyTrainingSetError when no tile is given
   */
  static async train(
    tiles: AsyncIterable<Tile> | Iterable<Tile>,
    options: TrainingOptions = {},
  ): Promise<ThresholdClassifier> {
    const means = new RunningStats();
    let tileIds = List<string>();

    for await (const tile of tiles) {
      means.push(extractFeatures(tile).meanIntensity);
      tileIds = tileIds.push(tile.id);
    }

    const stats = means.summary();
    if (stats === undefined) throw new EmptyTrainingSetError();

    const model = new ThresholdClassifier({
      version: randomUUID(),
      threshold: stats.mean,
      createdAt: new Date().toISOString(),
      provenance: {
        tileIds: tileIds.toArray(),
        ...(options.source !== undefined ? { source: options.source } : {}),
      },
      trainingStats: {
        tileCount: stats.count,
        mean: stats.mean,
        std: stats.std,
      },
    });
    debug(
      "trained %s on %o tiles, threshold %o",
      model.version,
      stats.count,
      model.threshold,
    );

    return model;
  }

  /**
   * Validate a parsed artifact
   *
   * @throws ModelArtifactError when a field is missing or mistyped
   */
  static fromArtifact(raw: unknown): ThresholdClassifier {
    const parsed = artifactSchema.safeParse(raw);
    if (!parsed.success)
      throw new ModelArtifactError(
        `malformed model artifact: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
          .join("; ")}`,
      );

    return new ThresholdClassifier(parsed.data);
  }

  static deserialize(text: string): ThresholdClassifier {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      throw new ModelArtifactError("model artifact is not valid JSON", {
        cause: e,
      });
    }
    return ThresholdClassifier.fromArtifact(raw);
  }

  /** Class 1 iff the mean intensity is strictly above the threshold */
  classify(meanIntensity: number): PredictedClass {
    return meanIntensity > this.threshold ? 1 : 0;
  }

  predict(tile: Tile): Prediction {
    const features = extractFeatures(tile);

    return {
      tileId: tile.id,
      prediction: this.classify(features.meanIntensity),
      meanIntensity: features.meanIntensity,
      stdIntensity: features.stdIntensity,
      timestamp: new Date().toISOString(),
    };
  }

  toArtifact(): ModelArtifact {
    return {
      version: this.version,
      threshold: this.threshold,
      createdAt: this.createdAt,
      ...(this.provenance !== undefined
        ? {
            provenance: {
              ...this.provenance,
              tileIds: [...this.provenance.tileIds],
            },
          }
        : {}),
      ...(this.trainingStats !== undefined
        ? { trainingStats: { ...this.trainingStats } }
        : {}),
    };
  }

  /** Human readable, diff friendly document */
  serialize(): string {
    return JSON.stringify(this.toArtifact(), undefined, 2) + "\n";
  }
}
