import createDebug from "debug";

import { AggregatorFinalizedError, describeError } from "../errors.js";
import type { PredictedClass } from "../types/index.js";
import { RunningStats } from "../processing/stats.js";
import type { StatsSummary } from "../processing/stats.js";

const debug = createDebug("tessera:observability");

/** Frozen outcome of one run */
export interface MonitoringMetrics {
  readonly tilesInferred: number;
  readonly tilesFailed: number;
  /** failed / (inferred + failed), 0 for an empty run */
  readonly failureRatio: number;
  /** count of predictions per class, indexed by class */
  readonly classHistogram: readonly [number, number];
  /** share of class 1 among inferred tiles, null if none was inferred */
  readonly positiveRatio: number | null;
  /** distribution of the per-tile mean intensity */
  readonly meanIntensity: Readonly<StatsSummary> | null;
  readonly latencyMs: Readonly<StatsSummary> | null;
}

export interface SuccessRecord {
  tileId: string;
  latencyMs: number;
  meanIntensity: number;
  prediction: PredictedClass;
}

/**
 * Accumulates the metrics of a single run
 *
 * Owned by one runner, not meant to be shared. State is constant-size.
 */
export class MetricsAggregator {
  #inferred = 0;
  #failed = 0;
  readonly #histogram: [number, number] = [0, 0];
  readonly #features = new RunningStats();
  readonly #latency = new RunningStats();
  #finalized: MonitoringMetrics | undefined;

  recordSuccess(record: SuccessRecord): void {
    this.#assertOpen();

    this.#inferred++;
    this.#histogram[record.prediction]++;
    this.#features.push(record.meanIntensity);
    this.#latency.push(record.latencyMs);
  }

  recordFailure(tileId: string, cause: unknown): void {
    this.#assertOpen();

    this.#failed++;
    debug("tile %s failed, skipping: %s", tileId, describeError(cause));
  }

  get finalized(): boolean {
    return this.#finalized !== undefined;
  }

  /** Freeze the counters, later calls return the same value */
  finalize(): MonitoringMetrics {
    if (this.#finalized !== undefined) return this.#finalized;

    const total = this.#inferred + this.#failed;
    const histogram: readonly [number, number] = [
      this.#histogram[0],
      this.#histogram[1],
    ];
    const freeze = (s: StatsSummary | undefined): Readonly<StatsSummary> | null =>
      s === undefined ? null : Object.freeze(s);

    this.#finalized = Object.freeze({
      tilesInferred: this.#inferred,
      tilesFailed: this.#failed,
      failureRatio: total === 0 ? 0 : this.#failed / total,
      classHistogram: Object.freeze(histogram),
      positiveRatio:
        this.#inferred === 0 ? null : this.#histogram[1] / this.#inferred,
      meanIntensity: freeze(this.#features.summary()),
      latencyMs: freeze(this.#latency.summary()),
    });
    return this.#finalized;
  }

  #assertOpen(): void {
    if (this.#finalized !== undefined) throw new AggregatorFinalizedError();
  }
}
