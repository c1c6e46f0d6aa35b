import { List } from "immutable";

import type { HealthConfig } from "../config.js";
import type { MonitoringMetrics } from "./aggregator.js";

export type HealthStatus = "healthy" | "degraded" | "drift-suspected";

export type HealthCheckName =
  | "failure-ratio"
  | "class-skew"
  | "baseline-mean"
  | "baseline-std";

export interface HealthCheck {
  name: HealthCheckName;
  /** null when the metrics do not allow the check */
  observed: number | null;
  limit: number;
  triggered: boolean;
}

/** Feature distribution the model was trained on */
export interface Baseline {
  mean: number;
  std: number;
}

/** Change relative to the baseline, null when it cannot be computed */
export interface BaselineComparison {
  meanDelta: number | null;
  stdDelta: number | null;
}

export interface HealthReport {
  status: HealthStatus;
  checks: readonly HealthCheck[];
  recommendations: readonly string[];
  baseline: BaselineComparison | null;
}

const percent = (ratio: number): string => `${(ratio * 100).toFixed(1)}%`;

function relativeDelta(live: number, reference: number): number | null {
  if (reference === 0) return null;
  return (live - reference) / Math.abs(reference);
}

/**
 * Judge a finalized run
 *
 * Every check is evaluated and every triggered one adds a recommendation.
 * Status is the worst outcome: a high failure ratio degrades the run, skewed
 * predictions or a move away from the training baseline suggest drift.
 */
export function evaluateHealth(
  metrics: MonitoringMetrics,
  config: HealthConfig,
  baseline?: Baseline,
): HealthReport {
  let checks = List<HealthCheck>();
  let recommendations = List<string>();

  const total = metrics.tilesInferred + metrics.tilesFailed;
  const failing = total > 0 && metrics.failureRatio > config.maxFailureRatio;
  checks = checks.push({
    name: "failure-ratio",
    observed: total > 0 ? metrics.failureRatio : null,
    limit: config.maxFailureRatio,
    triggered: failing,
  });
  if (failing)
    recommendations = recommendations.push(
      `Investigate tile ingestion or model compatibility: ${metrics.tilesFailed} of ${total} tiles failed (${percent(metrics.failureRatio)}).`,
    );

  const [dark, bright] = metrics.classHistogram;
  const majority: 0 | 1 = bright > dark ? 1 : 0;
  const proportion =
    metrics.tilesInferred > 0
      ? metrics.classHistogram[majority] / metrics.tilesInferred
      : null;
  const skewed = proportion !== null && proportion > config.maxClassProportion;
  checks = checks.push({
    name: "class-skew",
    observed: proportion,
    limit: config.maxClassProportion,
    triggered: skewed,
  });
  if (skewed)
    recommendations = recommendations.push(
      `Review the input distribution or retrain the model: ${percent(proportion)} of tiles were predicted as class ${majority}.`,
    );

  let comparison: BaselineComparison | null = null;
  let drifting = false;
  if (baseline !== undefined && metrics.meanIntensity !== null) {
    comparison = {
      meanDelta: relativeDelta(metrics.meanIntensity.mean, baseline.mean),
      stdDelta: relativeDelta(metrics.meanIntensity.std, baseline.std),
    };

    for (const [name, delta] of [
      ["baseline-mean", comparison.meanDelta],
      ["baseline-std", comparison.stdDelta],
    ] as const) {
      const triggered =
        delta !== null && Math.abs(delta) > config.maxBaselineDrift;
      checks = checks.push({
        name,
        observed: delta,
        limit: config.maxBaselineDrift,
        triggered,
      });
      if (triggered) {
        drifting = true;
        recommendations = recommendations.push(
          `Consider retraining the model with recent data: ${name === "baseline-mean" ? "mean" : "spread"} of tile intensity moved ${percent(delta)} from training.`,
        );
      }
    }
  }

  let status: HealthStatus = "healthy";
  if (failing) status = "degraded";
  else if (skewed || drifting) status = "drift-suspected";

  return {
    status,
    checks: checks.toArray(),
    recommendations: recommendations.toArray(),
    baseline: comparison,
  };
}
