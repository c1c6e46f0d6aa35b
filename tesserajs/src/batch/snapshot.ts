import { z } from "zod";

import { SerializationError } from "../errors.js";
import type { MonitoringMetrics } from "../observability/aggregator.js";
import type { HealthReport } from "../observability/health.js";
import type { Prediction } from "../types/index.js";

export interface FailureRecord {
  tileId: string;
  cause: string;
}

export interface SnapshotMetadata {
  runId: string;
  modelPath: string;
  modelVersion: string;
  /** ISO-8601 */
  startedAt: string;
  completedAt: string;
  tilesInferred: number;
  tilesFailed: number;
  monitoring: MonitoringMetrics;
  healthReport: HealthReport;
  failures: readonly FailureRecord[];
}

/** Single output of a batch run, written once */
export interface BatchSnapshot {
  metadata: SnapshotMetadata;
  /** ordered as the tiles were processed */
  predictions: readonly Prediction[];
}

const count = z.number().int().nonnegative();

const statsSchema = z
  .object({
    count,
    mean: z.number(),
    variance: z.number(),
    std: z.number(),
    min: z.number(),
    max: z.number(),
  })
  .nullable();

const snapshotSchema = z.object({
  metadata: z.object({
    runId: z.string().min(1),
    modelPath: z.string(),
    modelVersion: z.string().min(1),
    startedAt: z.string().datetime(),
    completedAt: z.string().datetime(),
    tilesInferred: count,
    tilesFailed: count,
    monitoring: z.object({
      tilesInferred: count,
      tilesFailed: count,
      failureRatio: z.number().min(0).max(1),
      classHistogram: z.tuple([count, count]),
      positiveRatio: z.number().nullable(),
      meanIntensity: statsSchema,
      latencyMs: statsSchema,
    }),
    healthReport: z.object({
      status: z.enum(["healthy", "degraded", "drift-suspected"]),
      checks: z.array(
        z.object({
          name: z.enum([
            "failure-ratio",
            "class-skew",
            "baseline-mean",
            "baseline-std",
          ]),
          observed: z.number().nullable(),
          limit: z.number(),
          triggered: z.boolean(),
        }),
      ),
      recommendations: z.array(z.string()),
      baseline: z
        .object({
          meanDelta: z.number().nullable(),
          stdDelta: z.number().nullable(),
        })
        .nullable(),
    }),
    failures: z.array(z.object({ tileId: z.string(), cause: z.string() })),
  }),
  predictions: z.array(
    z.object({
      tileId: z.string(),
      prediction: z.union([z.literal(0), z.literal(1)]),
      meanIntensity: z.number(),
      stdIntensity: z.number(),
      timestamp: z.string().datetime(),
    }),
  ),
});

export function serializeSnapshot(snapshot: BatchSnapshot): string {
  return JSON.stringify(snapshot, undefined, 2) + "\n";
}

/**
 * Validate a stored snapshot
 *
 * @throws SerializationError when the document does not match
 */
export function parseSnapshot(text: string): BatchSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new SerializationError("batch snapshot is not valid JSON", {
      cause: e,
    });
  }

  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success)
    throw new SerializationError(
      `malformed batch snapshot: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
    );

  const { metadata } = parsed.data;
  if (metadata.tilesInferred !== parsed.data.predictions.length)
    throw new SerializationError(
      `batch snapshot lists ${parsed.data.predictions.length} predictions for ${metadata.tilesInferred} inferred tiles`,
    );

  return parsed.data;
}
