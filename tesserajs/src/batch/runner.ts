import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";
import createDebug from "debug";
import { List } from "immutable";

import type { HealthConfig } from "../config.js";
import { describeError, NoTilesError, RunnerStateError } from "../errors.js";
import type { ThresholdClassifier } from "../models/index.js";
import { MetricsAggregator } from "../observability/aggregator.js";
import { evaluateHealth } from "../observability/health.js";
import type { Prediction, TileStore } from "../types/index.js";
import type { BatchSnapshot, FailureRecord } from "./snapshot.js";

const debug = createDebug("tessera:batch");

export type RunnerState =
  | "INIT"
  | "LOADING_MODEL"
  | "RUNNING"
  | "FINALIZING"
  | "DONE"
  | "FAILED";

const TRANSITIONS: Readonly<Record<RunnerState, readonly RunnerState[]>> = {
  INIT: ["LOADING_MODEL"],
  LOADING_MODEL: ["RUNNING", "FAILED"],
  RUNNING: ["FINALIZING"],
  // FAILED only when the snapshot cannot be stored
  FINALIZING: ["DONE", "FAILED"],
  DONE: [],
  FAILED: [],
};

/** Where models are loaded from, read-only */
export interface ModelStore {
  /**
   * @throws ModelNotFoundError when nothing is stored under the reference
   * @throws ModelArtifactError when the stored artifact is malformed
   */
  load(reference: string): Promise<ThresholdClassifier>;
}

/** Durable destination of snapshots */
export interface SnapshotStore {
  /**
   * Store the whole snapshot or nothing
   *
   * @returns where it was written
   */
  write(snapshot: BatchSnapshot): Promise<string>;
}

export interface BatchRunnerConfig {
  modelReference: string;
  health: HealthConfig;
}

export interface BatchResult {
  snapshot: BatchSnapshot;
  location: string;
}

/**
 * One batch inference run
 *
 * Loads the model once, then goes through the tiles sequentially in
 * lexicographic order. A tile that cannot be read or predicted is counted as
 * failed and skipped; only model loading or an empty tile store abort the
 * run. The snapshot is handed to the store in a single write at the end.
 */
export class BatchRunner {
  #state: RunnerState = "INIT";

  constructor(
    private readonly config: BatchRunnerConfig,
    private readonly stores: {
      tiles: TileStore;
      models: ModelStore;
      snapshots: SnapshotStore;
    },
  ) {}

  get state(): RunnerState {
    return this.#state;
  }

  async run(): Promise<BatchResult> {
    if (this.#state !== "INIT")
      throw new RunnerStateError(
        `a runner is single use, this one is ${this.#state}`,
      );

    const runId = randomUUID();
    const startedAt = new Date().toISOString();
    debug("run %s started", runId);

    this.#transition("LOADING_MODEL");
    let model: ThresholdClassifier;
    let tileIds: List<string>;
    try {
      model = await this.stores.models.load(this.config.modelReference);
      tileIds = (await this.stores.tiles.list()).sort();
      if (tileIds.isEmpty()) throw new NoTilesError(this.stores.tiles.location);
    } catch (e) {
      this.#transition("FAILED");
      throw e;
    }
    debug(
      "loaded model %s, %o tiles to process",
      model.version,
      tileIds.size,
    );

    this.#transition("RUNNING");
    const aggregator = new MetricsAggregator();
    let predictions = List<Prediction>();
    let failures = List<FailureRecord>();

    for (const tileId of tileIds) {
      const start = performance.now();

      let prediction: Prediction;
      try {
        prediction = model.predict(await this.stores.tiles.read(tileId));
      } catch (e) {
        aggregator.recordFailure(tileId, e);
        failures = failures.push({ tileId, cause: describeError(e) });
        continue;
      }

      aggregator.recordSuccess({
        tileId,
        latencyMs: performance.now() - start,
        meanIntensity: prediction.meanIntensity,
        prediction: prediction.prediction,
      });
      predictions = predictions.push(prediction);
    }

    this.#transition("FINALIZING");
    const monitoring = aggregator.finalize();
    const healthReport = evaluateHealth(
      monitoring,
      this.config.health,
      model.trainingStats,
    );
    for (const check of healthReport.checks)
      if (check.triggered)
        debug(
          "health check %s triggered: observed %o, limit %o",
          check.name,
          check.observed,
          check.limit,
        );

    const snapshot: BatchSnapshot = {
      metadata: {
        runId,
        modelPath: this.config.modelReference,
        modelVersion: model.version,
        startedAt,
        completedAt: new Date().toISOString(),
        tilesInferred: monitoring.tilesInferred,
        tilesFailed: monitoring.tilesFailed,
        monitoring,
        healthReport,
        failures: failures.toArray(),
      },
      predictions: predictions.toArray(),
    };

    let location: string;
    try {
      location = await this.stores.snapshots.write(snapshot);
    } catch (e) {
      this.#transition("FAILED");
      throw e;
    }

    this.#transition("DONE");
    debug(
      "run %s done: %o inferred, %o failed, %s, written to %s",
      runId,
      monitoring.tilesInferred,
      monitoring.tilesFailed,
      healthReport.status,
      location,
    );

    return { snapshot, location };
  }

  #transition(to: RunnerState): void {
    if (!TRANSITIONS[this.#state].includes(to))
      throw new RunnerStateError(`cannot go from ${this.#state} to ${to}`);

    debug("%s -> %s", this.#state, to);
    this.#state = to;
  }
}
